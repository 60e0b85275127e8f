export { KnownItemIndex } from './known-item-index.js';
export { resolveDuplicate } from './resolver.js';
export { hammingDistance, isPerceptualHash, NEAR_DUPLICATE_THRESHOLD } from './near.js';
