import { describe, it, expect } from 'vitest';
import { ChannelFault, DestinationBuffer } from '../src/index';

describe('DestinationBuffer', () => {
  it('starts with every slot empty', () => {
    const dest = DestinationBuffer.create(3);
    expect(dest.toArray()).toEqual([undefined, undefined, undefined]);
    expect(dest.filledCount).toBe(0);
  });

  it('stores integers and reals exactly', () => {
    const dest = DestinationBuffer.create(3);
    dest.write(2, 73);
    dest.write(0, 12.345678901234);
    expect(dest.toArray()).toEqual([12.345678901234, undefined, 73]);
    expect(dest.read(2)).toBe(73);
    expect(dest.filledCount).toBe(2);
  });

  it('writes each slot at most once', () => {
    const dest = DestinationBuffer.create(2);
    dest.write(1, 5);
    expect(() => dest.write(1, 6)).toThrow('Destination slot 1 was already written.');
    expect(dest.read(1)).toBe(5);
  });

  it('rejects indices outside [0, size)', () => {
    const dest = DestinationBuffer.create(3);
    expect(() => dest.write(3, 1)).toThrow('Destination index 3 is outside [0, 3).');
    expect(() => dest.write(-1, 1)).toThrow(ChannelFault);
    expect(dest.read(7)).toBeUndefined();
  });

  it('shares its slots with an attached view', () => {
    const dest   = DestinationBuffer.create(2);
    const remote = DestinationBuffer.attach(dest.sab);
    remote.write(0, 0);
    expect(remote.size).toBe(2);
    expect(dest.read(0)).toBe(0);
  });

  it('handles an empty destination', () => {
    const dest = DestinationBuffer.create(0);
    expect(dest.toArray()).toEqual([]);
    expect(DestinationBuffer.attach(dest.sab).size).toBe(0);
  });

  it('rejects a buffer whose length is not a whole number of slots', () => {
    expect(() => DestinationBuffer.attach(new SharedArrayBuffer(10))).toThrow(ChannelFault);
    expect(() => DestinationBuffer.create(-1)).toThrow(RangeError);
  });
});
