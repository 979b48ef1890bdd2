import type { Block, BlockRef } from '../diff/types.js';
import type { FetchCapability } from '../types/fetch.js';
import { extractRefs, spliceRefs } from './refs.js';

/**
 * Resolves reference markers to the text of the blocks they point at.
 *
 * `level` is the hop budget: 0 leaves markers verbatim, 1 resolves direct
 * references to blocks that are already loaded, and each further level allows
 * one more hop, fetching targets that are not loaded. A target already on the
 * current chain renders as its marker, so cycles terminate.
 *
 * A target that cannot be found renders as its marker. Errors raised by the
 * fetch capability itself (transport, authentication) propagate to the caller.
 */
export class RefResolver {
  private fetched = new Map<string, Block | null>();

  constructor(
    private lookup: ReadonlyMap<string, Block>,
    private fetcher?: FetchCapability
  ) {}

  /**
   * Resolve a single reference. Page references, page embeds and aliases
   * already carry their display text and come back unchanged.
   *
   * @param chain - UIDs being resolved above this reference
   */
  async resolveRef(ref: BlockRef, level: number, chain: ReadonlySet<string> = new Set()): Promise<string> {
    if (level <= 0) return ref.marker;
    if (ref.targetKind !== 'block-reference' && ref.targetKind !== 'block-embed') return ref.marker;
    if (chain.has(ref.targetId)) return ref.marker;

    const target = await this.findTarget(ref.targetId, level);
    if (!target) return ref.marker;

    const nextChain = new Set(chain);
    nextChain.add(ref.targetId);
    return this.resolveText(target.text, level - 1, nextChain);
  }

  /**
   * Replace every reference marker in text, in document order.
   */
  async resolveText(text: string, level: number, chain: ReadonlySet<string> = new Set()): Promise<string> {
    if (level <= 0) return text;

    const refs = extractRefs(text);
    if (refs.length === 0) return text;

    // Fetches happen one at a time, in document order
    const replacements: string[] = [];
    for (const ref of refs) {
      replacements.push(await this.resolveRef(ref, level, chain));
    }
    return spliceRefs(text, refs, replacements);
  }

  /**
   * Look up the block a reference points at, within the same hop budget
   * `resolveRef` applies.
   */
  findBlock(uid: string, level: number): Promise<Block | null> {
    return this.findTarget(uid, level);
  }

  private async findTarget(uid: string, level: number): Promise<Block | null> {
    const local = this.lookup.get(uid);
    if (local) return local;

    // Targets outside the loaded tree cost a hop of their own
    if (level <= 1 || !this.fetcher) return null;

    if (this.fetched.has(uid)) {
      return this.fetched.get(uid) ?? null;
    }
    const block = await this.fetcher.fetchById(uid);
    this.fetched.set(uid, block);
    return block;
  }
}
