/**
 * Sample records shared by the package test suites.
 */

export interface Product {
  id: number;
  name: string;
  category: string;
  price: number;
  stock: number;
  /** Absent for products never discounted */
  discount?: number | null;
}

export type OrderStatus = 'open' | 'shipped' | 'cancelled';

export interface Order {
  id: number;
  /** null for guest checkouts */
  customerId: number | null;
  total: number;
  status: OrderStatus;
  /** Epoch milliseconds */
  createdAt: number;
}

export interface Customer {
  id: number;
  name: string;
  region: string;
}

export function sampleProducts(): Product[] {
  return [
    { id: 1, name: 'Anvil', category: 'tools', price: 120, stock: 3 },
    { id: 2, name: 'Bolt', category: 'hardware', price: 0.25, stock: 900, discount: 0.05 },
    { id: 3, name: 'Chisel', category: 'tools', price: 18.5, stock: 0 },
    { id: 4, name: 'Drill', category: 'tools', price: 89.99, stock: 12, discount: null },
    { id: 5, name: 'Epoxy', category: 'adhesives', price: 7, stock: 40 },
    { id: 6, name: 'File', category: 'tools', price: 9.75, stock: 0, discount: 1.5 },
  ];
}

export function sampleCustomers(): Customer[] {
  return [
    { id: 10, name: 'Ada', region: 'north' },
    { id: 11, name: 'Brook', region: 'south' },
    { id: 12, name: 'Cato', region: 'north' },
  ];
}

/** 2024-03-04T00:00:00.000Z, a Monday */
export const FIXTURE_EPOCH = Date.UTC(2024, 2, 4);

export function sampleOrders(): Order[] {
  const hour = 60 * 60 * 1000;
  return [
    { id: 100, customerId: 10, total: 250, status: 'shipped', createdAt: FIXTURE_EPOCH + 10 * hour },
    { id: 101, customerId: 11, total: 40, status: 'open', createdAt: FIXTURE_EPOCH + 30 * hour },
    { id: 102, customerId: 10, total: 75, status: 'open', createdAt: FIXTURE_EPOCH + 50 * hour },
    { id: 103, customerId: null, total: 15, status: 'cancelled', createdAt: FIXTURE_EPOCH + 130 * hour },
    { id: 104, customerId: 99, total: 500, status: 'shipped', createdAt: FIXTURE_EPOCH + 140 * hour },
  ];
}
