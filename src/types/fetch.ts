import type { Block } from '../diff/types.js';

type MaybePromise<T> = T | Promise<T>;

/**
 * Read access to the remote store. `null` means not found.
 */
export interface FetchCapability {
  fetchById(uid: string): MaybePromise<Block | null>;
  fetchPage(title: string): MaybePromise<Block | null>;
  /**
   * Blocks referenced from anywhere below `uid`, text only. Lets a renderer
   * resolve off-page references without spending a fetch level.
   */
  fetchReferences?(uid: string): MaybePromise<Block[]>;
}
