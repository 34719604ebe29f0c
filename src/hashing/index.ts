export type { Hash64 } from './Hash64';

export { hash64 } from './Hash64';
export { murmur3 } from './Murmur3';
