import { describe, it, expect } from 'vitest';
import { defaultCloner, field, isPresent, path } from '../field.js';
import { fromMapValues, isQueryable, toArray, toIterable } from '../queryable.js';

interface Address {
  city: string;
}

interface Customer {
  name: string;
  address: Address;
}

describe('field accessors', () => {
  it('should read a named field', () => {
    const name = field<Customer>()('name');
    expect(name({ name: 'Ada', address: { city: 'Oslo' } })).toBe('Ada');
  });

  it('should compose nested fields with path', () => {
    const city = path(field<Customer>()('address'), field<Address>()('city'));
    expect(city({ name: 'Ada', address: { city: 'Oslo' } })).toBe('Oslo');
  });

  it('should deep-copy with the default cloner', () => {
    const original = { name: 'Ada', address: { city: 'Oslo' } };
    const copy = defaultCloner(original);
    copy.address.city = 'Bergen';
    expect(original.address.city).toBe('Oslo');
  });

  it('should treat only null and undefined as absent', () => {
    expect([0, '', false, null, undefined, Number.NaN].filter(isPresent)).toHaveLength(4);
  });
});

describe('query sources', () => {
  it('should detect Queryable objects', () => {
    const table = fromMapValues(new Map([['a', 1]]));
    expect(isQueryable(table)).toBe(true);
    expect(isQueryable([1, 2])).toBe(false);
    expect([...toIterable(table)]).toEqual([1]);
  });

  it('should borrow arrays and materialize other iterables', () => {
    const values = [1, 2, 3];
    expect(toArray(values)).toBe(values);
    expect(toArray(new Set(values))).toEqual(values);
  });
});
