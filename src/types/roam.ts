/**
 * Raw Roam block structure as returned from pull queries.
 * Uses Roam's keyword-prefixed property names.
 */
export interface RoamApiBlock {
  ':block/uid'?: string;
  ':block/string'?: string;
  ':node/title'?: string;
  ':block/order'?: number;
  ':block/heading'?: number | null;
  ':block/open'?: boolean;
  ':children/view-type'?: string;
  ':block/children'?: RoamApiBlock[];
}

export type RoamViewType = 'bullet' | 'document' | 'numbered';

export interface RoamLocation {
  'parent-uid': string;
  order: number | 'first' | 'last';
}

export interface RoamBlockFields {
  string?: string;
  heading?: number;
  open?: boolean;
  'children-view-type'?: RoamViewType;
}

export type RoamBatchAction =
  | { action: 'create-page'; page: { title: string; uid: string } }
  | { action: 'create-block'; location: RoamLocation; block: RoamBlockFields & { uid: string; string: string } }
  | { action: 'update-block'; block: RoamBlockFields & { uid: string } }
  | { action: 'move-block'; block: { uid: string }; location: RoamLocation }
  | { action: 'delete-block'; block: { uid: string } };
