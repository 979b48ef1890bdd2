/**
 * Action Planner
 *
 * Turns a Correspondence into an ordered list of block operations.
 * The order is critical for correctness against the store:
 * 1. A created block comes before any operation on its children
 * 2. An update on a block comes before its move
 * 3. Deletes come last (one per removed subtree; the store deletes recursively)
 */

import type {
  AttributeValue,
  Block,
  Correspondence,
  CreatedEntry,
  DeleteBlockAction,
  MatchedEntry,
  NodeRef,
  PlanAction,
  PlanActionType,
  UpdateBlockAction,
} from './types.js';
import { PlanStructureError } from '../shared/errors.js';

export interface PlanOptions {
  /** Prefix for pending references of created blocks (default "new-") */
  refPrefix?: string;
}

function requireIdentifier(block: Block, role: string): string {
  if (block.identifier === undefined || block.identifier === '') {
    throw new PlanStructureError(`${role} block "${block.text}" has no identifier`);
  }
  return block.identifier;
}

/**
 * Check the invariants the planner relies on.
 * A violation means the aligner produced something inconsistent.
 */
export function validateCorrespondence(correspondence: Correspondence): void {
  const root = correspondence.root;
  const seenUids = new Set<string>();
  const seenDesired = new Set<Block>();

  if (root.existing.identifier === undefined) {
    if (root.existing.children.length > 0) {
      throw new PlanStructureError('Existing root without identifier cannot have children');
    }
  } else {
    seenUids.add(root.existing.identifier);
  }

  function claimUid(block: Block, role: string): void {
    const uid = requireIdentifier(block, role);
    if (seenUids.has(uid)) {
      throw new PlanStructureError(`Identifier "${uid}" appears more than once in the correspondence`);
    }
    seenUids.add(uid);
  }

  function claimDesired(block: Block): void {
    if (seenDesired.has(block)) {
      throw new PlanStructureError(`Desired block "${block.text}" is matched more than once`);
    }
    seenDesired.add(block);
  }

  function checkCreated(entry: CreatedEntry): void {
    claimDesired(entry.desired);
    entry.children.forEach(checkCreated);
  }

  function checkMatched(entry: MatchedEntry): void {
    const ownChildren = new Set(entry.existing.children);
    let accounted = 0;

    for (const child of entry.children) {
      if (child.status === 'created') {
        checkCreated(child);
        continue;
      }
      claimDesired(child.desired);
      claimUid(child.existing, 'Matched');
      if (!ownChildren.has(child.existing)) {
        throw new PlanStructureError(
          `Block "${child.existing.identifier}" is matched under a different parent`
        );
      }
      accounted++;
      checkMatched(child);
    }

    for (const removed of entry.deleted) {
      claimUid(removed, 'Deleted');
      if (!ownChildren.has(removed)) {
        throw new PlanStructureError(
          `Block "${removed.identifier}" is deleted under a different parent`
        );
      }
      accounted++;
    }

    if (accounted !== entry.existing.children.length) {
      throw new PlanStructureError(
        `Children of "${entry.existing.identifier ?? entry.existing.text}" are not all accounted for`
      );
    }
  }

  checkMatched(root);
}

function buildUpdate(entry: MatchedEntry, uid: string): UpdateBlockAction {
  const update: UpdateBlockAction = { action: 'update-block', uid };

  if (entry.existing.text !== entry.desired.text) {
    update.string = entry.desired.text;
  }

  const attributes: Record<string, AttributeValue | null> = {};
  for (const [key, value] of Object.entries(entry.desired.attributes)) {
    if (entry.existing.attributes[key] !== value) {
      attributes[key] = value;
    }
  }
  for (const key of Object.keys(entry.existing.attributes)) {
    if (!Object.prototype.hasOwnProperty.call(entry.desired.attributes, key)) {
      attributes[key] = null;
    }
  }
  if (Object.keys(attributes).length > 0) {
    update.attributes = attributes;
  }

  return update;
}

/**
 * Generate the ordered action plan for a Correspondence.
 *
 * Sibling orders are computed against a simulation of each sibling list as
 * the plan executes: every created or moved block is placed right after its
 * desired predecessor, and blocks that keep their relative order are not
 * touched.
 *
 * @throws PlanStructureError when the correspondence violates an invariant
 */
export function planActions(correspondence: Correspondence, options: PlanOptions = {}): PlanAction[] {
  validateCorrespondence(correspondence);

  const prefix = options.refPrefix ?? 'new-';
  let counter = 0;
  const nextRef = (): string => `${prefix}${++counter}`;

  const actions: PlanAction[] = [];
  const deletes: DeleteBlockAction[] = [];

  function planCreated(entry: CreatedEntry, parent: NodeRef, order: number): string {
    const ref = nextRef();
    actions.push({
      action: 'create-block',
      ref,
      parent,
      order,
      string: entry.desired.text,
      attributes: entry.desired.attributes,
    });
    entry.children.forEach((child, idx) => {
      planCreated(child, { kind: 'pending', ref }, idx);
    });
    return ref;
  }

  function planChildren(entry: MatchedEntry, parent: NodeRef): void {
    // Simulated sibling list: UIDs of persisted blocks, refs of created ones
    const siblings = entry.existing.children.map((child) => requireIdentifier(child, 'Existing'));
    let previous: string | null = null;

    const insertionIndex = (): number => (previous === null ? 0 : siblings.indexOf(previous) + 1);

    for (const child of entry.children) {
      if (child.status === 'created') {
        const order = insertionIndex();
        const ref = planCreated(child, parent, order);
        siblings.splice(order, 0, ref);
        previous = ref;
        continue;
      }

      const uid = requireIdentifier(child.existing, 'Matched');

      if (child.changed) {
        actions.push(buildUpdate(child, uid));
      }

      if (child.moved) {
        if (parent.kind !== 'uid') {
          throw new PlanStructureError(`Block "${uid}" cannot move under a block that does not exist yet`);
        }
        siblings.splice(siblings.indexOf(uid), 1);
        const order = insertionIndex();
        siblings.splice(order, 0, uid);
        actions.push({ action: 'move-block', uid, parentUid: parent.uid, order });
      }

      planChildren(child, { kind: 'uid', uid });
      previous = uid;
    }

    for (const removed of entry.deleted) {
      deletes.push({ action: 'delete-block', uid: requireIdentifier(removed, 'Deleted') });
    }
  }

  const root = correspondence.root;
  let rootParent: NodeRef;
  if (root.existing.identifier === undefined) {
    const ref = nextRef();
    actions.push({ action: 'create-page', ref, title: root.existing.text || root.desired.text });
    rootParent = { kind: 'pending', ref };
  } else {
    rootParent = { kind: 'uid', uid: root.existing.identifier };
  }

  planChildren(root, rootParent);

  return [...actions, ...deletes];
}

/**
 * Check if a plan contains no operations.
 */
export function isPlanEmpty(actions: readonly PlanAction[]): boolean {
  return actions.length === 0;
}

/**
 * Filter actions to only include specific action types.
 * Useful for dry-run analysis or debugging.
 */
export function filterActions(actions: readonly PlanAction[], types: PlanActionType[]): PlanAction[] {
  const typeSet = new Set(types);
  return actions.filter((a) => typeSet.has(a.action));
}

/**
 * Group actions by their type for analysis.
 */
export function groupActionsByType(actions: readonly PlanAction[]): {
  pages: PlanAction[];
  creates: PlanAction[];
  updates: PlanAction[];
  moves: PlanAction[];
  deletes: PlanAction[];
} {
  const pages: PlanAction[] = [];
  const creates: PlanAction[] = [];
  const updates: PlanAction[] = [];
  const moves: PlanAction[] = [];
  const deletes: PlanAction[] = [];

  for (const action of actions) {
    switch (action.action) {
      case 'create-page':
        pages.push(action);
        break;
      case 'create-block':
        creates.push(action);
        break;
      case 'update-block':
        updates.push(action);
        break;
      case 'move-block':
        moves.push(action);
        break;
      case 'delete-block':
        deletes.push(action);
        break;
    }
  }

  return { pages, creates, updates, moves, deletes };
}

/**
 * Summarize actions for logging purposes.
 */
export function summarizeActions(actions: readonly PlanAction[]): string {
  const grouped = groupActionsByType(actions);
  const parts: string[] = [];

  if (grouped.pages.length > 0) {
    parts.push(`${grouped.pages.length} page(s)`);
  }
  if (grouped.creates.length > 0) {
    parts.push(`${grouped.creates.length} create(s)`);
  }
  if (grouped.moves.length > 0) {
    parts.push(`${grouped.moves.length} move(s)`);
  }
  if (grouped.updates.length > 0) {
    parts.push(`${grouped.updates.length} update(s)`);
  }
  if (grouped.deletes.length > 0) {
    parts.push(`${grouped.deletes.length} delete(s)`);
  }

  if (parts.length === 0) {
    return 'No changes';
  }

  return parts.join(', ');
}
