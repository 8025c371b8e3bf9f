export { InMemoryCampusStore } from './in-memory-store.js';
