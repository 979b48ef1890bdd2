/**
 * Batch Translation
 *
 * Converts a plan into Roam batch actions. Pending references of created
 * blocks and pages are replaced by freshly generated UIDs.
 */

import type { AttributeValue, NodeRef, PlanAction } from './types.js';
import type { RoamBatchAction, RoamBlockFields, RoamViewType } from '../types/roam.js';
import { generateBlockUid } from '../utils/uid.js';

export interface TranslationResult {
  actions: RoamBatchAction[];
  /** pending reference -> generated UID */
  uidMap: Record<string, string>;
}

function toViewType(value: AttributeValue | null | undefined): RoamViewType | undefined {
  if (value === null) return 'bullet';
  if (value === 'bullet' || value === 'document' || value === 'numbered') return value;
  return undefined;
}

/**
 * Map block attributes onto Roam block fields. Unknown attributes are dropped.
 */
function toBlockFields(attributes: Readonly<Record<string, AttributeValue | null>>): RoamBlockFields {
  const fields: RoamBlockFields = {};

  if ('heading' in attributes) {
    const heading = attributes.heading;
    // 0 removes a heading
    if (heading === null) fields.heading = 0;
    else if (typeof heading === 'number') fields.heading = heading;
  }
  if (typeof attributes.open === 'boolean') {
    fields.open = attributes.open;
  }
  if ('children-view-type' in attributes) {
    const viewType = toViewType(attributes['children-view-type']);
    if (viewType) fields['children-view-type'] = viewType;
  }

  return fields;
}

/**
 * Translate a plan into Roam batch actions.
 *
 * @param plan - Ordered plan from planActions
 * @param generateUid - UID source for pending references
 */
export function toRoamBatchActions(
  plan: readonly PlanAction[],
  generateUid: () => string = generateBlockUid
): TranslationResult {
  const uidMap: Record<string, string> = {};

  const allocate = (ref: string): string => {
    const uid = generateUid();
    uidMap[ref] = uid;
    return uid;
  };

  const resolveParent = (parent: NodeRef): string => {
    if (parent.kind === 'uid') return parent.uid;
    const uid = uidMap[parent.ref];
    if (uid === undefined) {
      throw new Error(`Pending reference "${parent.ref}" is used before it is created`);
    }
    return uid;
  };

  const actions = plan.map((action): RoamBatchAction => {
    switch (action.action) {
      case 'create-page':
        return { action: 'create-page', page: { title: action.title, uid: allocate(action.ref) } };
      case 'create-block': {
        const parentUid = resolveParent(action.parent);
        return {
          action: 'create-block',
          location: { 'parent-uid': parentUid, order: action.order },
          block: { ...toBlockFields(action.attributes), uid: allocate(action.ref), string: action.string },
        };
      }
      case 'update-block': {
        const block: RoamBlockFields & { uid: string } = {
          uid: action.uid,
          ...toBlockFields(action.attributes ?? {}),
        };
        if (action.string !== undefined) block.string = action.string;
        return { action: 'update-block', block };
      }
      case 'move-block':
        return {
          action: 'move-block',
          block: { uid: action.uid },
          location: { 'parent-uid': action.parentUid, order: action.order },
        };
      case 'delete-block':
        return { action: 'delete-block', block: { uid: action.uid } };
    }
  });

  return { actions, uidMap };
}
