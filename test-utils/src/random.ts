/**
 * Seeded data generation, so generated datasets are reproducible across runs.
 */

import type { Customer, Order, OrderStatus, Product } from './fixtures.js';

/**
 * Mulberry32 generator.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number = Date.now()) {
    this.state = seed;
  }

  /**
   * Returns a random number between 0 (inclusive) and 1 (exclusive)
   */
  next(): number {
    let t = (this.state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /**
   * Random integer in [min, max]
   */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /**
   * Random float in [min, max) rounded to `decimals` places
   */
  float(min: number, max: number, decimals: number = 2): number {
    const factor = Math.pow(10, decimals);
    return Math.round((this.next() * (max - min) + min) * factor) / factor;
  }

  pick<T>(values: readonly T[]): T {
    return values[this.int(0, values.length - 1)];
  }

  /**
   * True with the given probability
   */
  chance(probability: number): boolean {
    return this.next() < probability;
  }
}

const CATEGORIES = ['tools', 'hardware', 'adhesives', 'garden'] as const;
const STATUSES: readonly OrderStatus[] = ['open', 'shipped', 'cancelled'];
const REGIONS = ['north', 'south', 'east', 'west'] as const;

export function generateProducts(count: number, seed: number = 1): Product[] {
  const random = new SeededRandom(seed);
  return Array.from({ length: count }, (_, i) => ({
    id: i + 1,
    name: `product-${i + 1}`,
    category: random.pick(CATEGORIES),
    price: random.float(0.5, 500),
    stock: random.int(0, 100),
    discount: random.chance(0.3) ? random.float(0, 5) : undefined,
  }));
}

export function generateCustomers(count: number, seed: number = 1): Customer[] {
  const random = new SeededRandom(seed);
  return Array.from({ length: count }, (_, i) => ({
    id: i + 1,
    name: `customer-${i + 1}`,
    region: random.pick(REGIONS),
  }));
}

/**
 * Orders referencing customer ids in [1, customerCount + 2]; some match no
 * customer and some have no customer at all.
 */
export function generateOrders(count: number, customerCount: number, seed: number = 1): Order[] {
  const random = new SeededRandom(seed);
  const start = Date.UTC(2024, 0, 1);
  return Array.from({ length: count }, (_, i) => ({
    id: i + 1,
    customerId: random.chance(0.1) ? null : random.int(1, customerCount + 2),
    total: random.float(1, 1000),
    status: random.pick(STATUSES),
    createdAt: start + random.int(0, 90) * 24 * 60 * 60 * 1000,
  }));
}
