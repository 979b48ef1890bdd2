/**
 * Diff Algorithm Types
 *
 * Type definitions for the block-tree diff: the shared Block model, the
 * correspondence produced by aligning two trees, and the action plan that
 * turns an existing tree into a desired one.
 */

export type AttributeValue = string | number | boolean;

/**
 * Block-level metadata such as `heading` or `children-view-type`.
 * Compared during matching, never used to assign identifiers.
 */
export type BlockAttributes = Readonly<Record<string, AttributeValue>>;

/**
 * A node of a hierarchical document.
 * `identifier` is the store's UID; it is absent on blocks that only exist
 * in a desired tree.
 */
export interface Block {
  identifier?: string;
  text: string;
  attributes: BlockAttributes;
  children: Block[];
}

export type Classification =
  | 'matched-unchanged'
  | 'matched-changed'
  | 'matched-moved'
  | 'created'
  | 'deleted';

/**
 * A desired block paired with an existing one.
 * `children` follows desired order; `deleted` lists existing children that
 * have no counterpart (each removed together with its subtree).
 */
export interface MatchedEntry {
  status: 'matched';
  existing: Block;
  desired: Block;
  existingIndex: number;
  desiredIndex: number;
  changed: boolean;
  moved: boolean;
  descendantsChanged: boolean;
  children: CorrespondenceEntry[];
  deleted: Block[];
}

/**
 * A desired block with no existing counterpart. Its whole subtree is new.
 */
export interface CreatedEntry {
  status: 'created';
  desired: Block;
  desiredIndex: number;
  children: CreatedEntry[];
}

export type CorrespondenceEntry = MatchedEntry | CreatedEntry;

/**
 * Result of aligning an existing tree against a desired tree.
 */
export interface Correspondence {
  root: MatchedEntry;
}

/**
 * Candidate pairing considered while matching one sibling level.
 */
export interface CandidatePair {
  existingIndex: number;
  desiredIndex: number;
  score: number;
}

/**
 * Orders two candidates with equal scores. Negative puts `a` first.
 */
export type TieBreaker = (a: CandidatePair, b: CandidatePair) => number;

export type BlockScorer = (existing: Block, desired: Block) => number;

export interface AlignOptions {
  /** Minimum score for a content match (default 0.5) */
  threshold?: number;
  scorer?: BlockScorer;
  tieBreak?: TieBreaker;
}

/**
 * Parent of a planned operation: either a persisted block or a block
 * created earlier in the same plan.
 */
export type NodeRef =
  | { kind: 'uid'; uid: string }
  | { kind: 'pending'; ref: string };

export interface CreatePageAction {
  action: 'create-page';
  ref: string;
  title: string;
}

export interface CreateBlockAction {
  action: 'create-block';
  ref: string;
  parent: NodeRef;
  order: number;
  string: string;
  attributes: BlockAttributes;
}

export interface UpdateBlockAction {
  action: 'update-block';
  uid: string;
  string?: string;
  /** Changed attributes; `null` removes the attribute */
  attributes?: Record<string, AttributeValue | null>;
}

export interface MoveBlockAction {
  action: 'move-block';
  uid: string;
  parentUid: string;
  /** Index among the siblings once the moving block is taken out */
  order: number;
}

export interface DeleteBlockAction {
  action: 'delete-block';
  uid: string;
}

export type PlanAction =
  | CreatePageAction
  | CreateBlockAction
  | UpdateBlockAction
  | MoveBlockAction
  | DeleteBlockAction;

export type PlanActionType = PlanAction['action'];

/**
 * Statistics about a correspondence.
 * Useful for logging and understanding the scope of changes.
 */
export interface DiffStats {
  creates: number;
  updates: number;
  moves: number;
  deletes: number;
  preserved: number;
}

export type RefKind = 'block-reference' | 'block-embed' | 'page-reference' | 'page-embed' | 'alias';

/**
 * A reference marker found inside a block's text.
 * `span` holds the marker's start (inclusive) and end (exclusive) offsets.
 */
export interface BlockRef {
  targetKind: RefKind;
  /** Block UID, or page title for page references and embeds */
  targetId: string;
  span: { start: number; end: number };
  marker: string;
}
