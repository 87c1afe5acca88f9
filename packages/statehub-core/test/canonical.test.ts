import { describe, expect, it } from 'vitest';
import { decodeCanonical, EncodingError, encodeCanonical } from '../src/index.js';

class Point {
  constructor(
    public x = 1,
    public y = 2,
  ) {}
}

class Place {
  #city = 'Bergen';

  get city(): string {
    return this.#city;
  }

  set city(value: string) {
    this.#city = value;
  }
}

function thrown(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  return undefined;
}

class Address {
  street = 'Main';

  get label(): string {
    return `#${this.street}`;
  }
}

describe('encodeCanonical', () => {
  it('should sort object keys', () => {
    expect(encodeCanonical({ b: 1, a: 2 })).toBe('{"a":2,"b":1}');
  });

  it('should encode equal content identically regardless of insertion order', () => {
    expect(encodeCanonical({ a: 1, b: [1, 2] })).toBe(encodeCanonical({ b: [1, 2], a: 1 }));
  });

  it('should tag values JSON cannot carry', () => {
    expect(encodeCanonical(undefined)).toBe('{"$t":"undefined"}');
    expect(encodeCanonical(Number.NaN)).toBe('{"$t":"number","v":"NaN"}');
    expect(encodeCanonical(10n)).toBe('{"$t":"bigint","v":"10"}');
    expect(encodeCanonical({ when: new Date(0) })).toBe('{"when":{"$t":"Date","v":0}}');
  });

  it('should sort map entries and set members', () => {
    expect(
      encodeCanonical(
        new Map([
          ['b', 1],
          ['a', 2],
        ]),
      ),
    ).toBe('{"$t":"Map","v":[["a",2],["b",1]]}');
    expect(encodeCanonical(new Set([3, 1, 2]))).toBe('{"$t":"Set","v":[1,2,3]}');
  });

  it('should record the class of an instance', () => {
    expect(encodeCanonical(new Point())).toBe('{"$t":"Object","c":"Point","v":{"x":1,"y":2}}');
  });

  it('should encode the getters a class instance inherits', () => {
    const place = new Place();
    expect(encodeCanonical(place)).toBe('{"$t":"Object","c":"Place","v":{"city":"Bergen"}}');
    place.city = 'Oslo';
    expect(encodeCanonical(place)).toBe('{"$t":"Object","c":"Place","v":{"city":"Oslo"}}');
  });

  it('should escape plain objects that own a $t key', () => {
    const text = encodeCanonical({ $t: 'x' });
    expect(text).toBe('{"$t":"Object","v":{"$t":"x"}}');
    expect(decodeCanonical(text)).toEqual({ $t: 'x' });
  });

  it('should skip function fields and nulls function elements', () => {
    expect(encodeCanonical({ a: 1, f: () => 1 })).toBe('{"a":1}');
    expect(encodeCanonical([1, () => 1])).toBe('[1,null]');
  });

  it('should reject values that contain themselves', () => {
    const node: { self?: unknown } = {};
    node.self = node;
    expect(() => encodeCanonical(node)).toThrow(EncodingError);
    expect(thrown(() => encodeCanonical(node))).toMatchObject({ code: 'CYCLIC_VALUE' });
  });

  it('should encode a shared reference twice', () => {
    const shared = { n: 1 };
    expect(encodeCanonical({ a: shared, b: shared })).toBe('{"a":{"n":1},"b":{"n":1}}');
  });
});

describe('decodeCanonical', () => {
  it('should rebuild instances on the prototype of a matching template', () => {
    const decoded = decodeCanonical(encodeCanonical(new Address()), new Address());
    expect(decoded).toBeInstanceOf(Address);
    expect(decoded).toHaveProperty('label', '#Main');
  });

  it('should decode instances as plain objects without a template', () => {
    const decoded = decodeCanonical(encodeCanonical(new Address()));
    expect(decoded).toEqual({ label: '#Main', street: 'Main' });
    expect(Object.getPrototypeOf(decoded)).toBe(Object.prototype);
  });

  it('should rebuild getter-backed fields as own values', () => {
    const template = new Place();
    template.city = 'Oslo';
    const decoded = decodeCanonical(encodeCanonical(new Place()), template);
    expect(decoded).toBeInstanceOf(Place);
    expect(decoded).toHaveProperty('city', 'Bergen');
    expect(template.city).toBe('Oslo');
  });

  it('should restore tagged values', () => {
    const value = { at: new Date(5), n: 3n, m: new Map([['k', new Set([1])]]) };
    expect(decodeCanonical(encodeCanonical(value))).toEqual(value);
  });

  it('should reject malformed tags', () => {
    expect(() => decodeCanonical('{"$t":"bigint","v":1}')).toThrow(EncodingError);
    expect(() => decodeCanonical('{"$t":"mystery"}')).toThrow(EncodingError);
    expect(thrown(() => decodeCanonical('{"$t":"Set","v":1}'))).toMatchObject({ code: 'MALFORMED_ENCODING' });
  });
});
