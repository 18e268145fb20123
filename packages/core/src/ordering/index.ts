export { GAP, MIN_GAP, allocatePosition } from './position-allocator.js';
export type { PositionEntry, Placement } from './position-allocator.js';
export { bucketOf, bucketKey, sameBucket, resolveSharedBucket } from './buckets.js';
export { planOverduePositions, assignOverduePositions } from './overdue-assigner.js';
export type { OverdueAssignment } from './overdue-assigner.js';
