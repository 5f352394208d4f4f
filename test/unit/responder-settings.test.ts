import { describe, it, expect } from 'vitest';
import { enabledResponderKinds } from '../../src/config/responders';

describe('enabledResponderKinds', () => {
  it('should keep the declared order of enabled responders', () => {
    expect(enabledResponderKinds({ product_details: true, reviews: false, orders: true })).toEqual([
      'product_details',
      'orders',
    ]);
  });

  it('should return nothing when every responder is off', () => {
    expect(enabledResponderKinds({ product_details: false, reviews: false, orders: false })).toEqual([]);
  });
});
