/**
 * @quarry/test-utils
 *
 * Shared fixtures and test doubles for quarry packages.
 */

export {
  sampleProducts,
  sampleCustomers,
  sampleOrders,
  FIXTURE_EPOCH,
  type Product,
  type Order,
  type OrderStatus,
  type Customer,
} from './fixtures.js';

export { SeededRandom, generateProducts, generateCustomers, generateOrders } from './random.js';

export { createManualClock, createSteppingClock, type ManualClock } from './clock.js';

export {
  CountingLock,
  countingLocks,
  trackedLocks,
  totalReads,
  type HeldTracker,
} from './counting-lock.js';
