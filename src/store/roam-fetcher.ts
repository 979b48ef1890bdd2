import { initializeGraph, q, type Graph } from '@roam-research/roam-api-sdk';
import type { Block } from '../diff/types.js';
import type { RoamApiBlock } from '../types/roam.js';
import type { FetchCapability } from '../types/fetch.js';
import { parseExistingBlock } from '../diff/parser.js';
import { validateEnvironment } from '../config/environment.js';

// Define ancestor rule for traversing block hierarchy
const ANCESTOR_RULE = `[
  [ (ancestor ?b ?a)
    [?a :block/children ?b] ]
  [ (ancestor ?b ?a)
    [?parent :block/children ?b]
    (ancestor ?parent ?a) ]
]`;

const PAGE_UID_QUERY = `[:find ?uid .
                         :in $ ?title
                         :where [?e :node/title ?title]
                                [?e :block/uid ?uid]]`;

const BLOCK_QUERY = `[:find ?string ?heading ?view ?open
                      :in $ ?uid
                      :where [?b :block/uid ?uid]
                             [?b :block/string ?string]
                             [(get-else $ ?b :block/heading 0) ?heading]
                             [(get-else $ ?b :children/view-type :bullet) ?view]
                             [(get-else $ ?b :block/open true) ?open]]`;

const DESCENDANTS_QUERY = `[:find ?block-uid ?block-str ?order ?heading ?view ?open ?parent-uid
                            :in $ % ?root-uid
                            :where [?root :block/uid ?root-uid]
                                   (ancestor ?block ?root)
                                   [?block :block/uid ?block-uid]
                                   [?block :block/string ?block-str]
                                   [?block :block/order ?order]
                                   [(get-else $ ?block :block/heading 0) ?heading]
                                   [(get-else $ ?block :children/view-type :bullet) ?view]
                                   [(get-else $ ?block :block/open true) ?open]
                                   [?parent :block/children ?block]
                                   [?parent :block/uid ?parent-uid]]`;

// Blocks referenced from the tree; pages carry no :block/string and drop out
const REFERENCES_QUERY = `[:find ?ref-uid ?ref-str
                           :in $ % ?root-uid
                           :where [?root :block/uid ?root-uid]
                                  (ancestor ?block ?root)
                                  [?block :block/refs ?ref]
                                  [?ref :block/uid ?ref-uid]
                                  [?ref :block/string ?ref-str]]`;

type BlockRow = [text: string, heading: number, view: unknown, open: unknown];

type DescendantRow = [
  uid: string,
  text: string,
  order: number,
  heading: number,
  view: unknown,
  open: unknown,
  parentUid: string,
];

function isBlockRow(row: unknown): row is BlockRow {
  return (
    Array.isArray(row) &&
    row.length === 4 &&
    typeof row[0] === 'string' &&
    typeof row[1] === 'number'
  );
}

function isDescendantRow(row: unknown): row is DescendantRow {
  return (
    Array.isArray(row) &&
    row.length === 7 &&
    typeof row[0] === 'string' &&
    typeof row[1] === 'string' &&
    typeof row[2] === 'number' &&
    typeof row[3] === 'number' &&
    typeof row[6] === 'string'
  );
}

// View type arrives as a keyword string; anything else falls back to the defaults
function viewAndOpen(view: unknown, open: unknown): Pick<RoamApiBlock, ':children/view-type' | ':block/open'> {
  return {
    ':children/view-type': typeof view === 'string' ? view : undefined,
    ':block/open': typeof open === 'boolean' ? open : undefined,
  };
}

function isReferenceRow(row: unknown): row is [uid: string, text: string] {
  return Array.isArray(row) && row.length === 2 && typeof row[0] === 'string' && typeof row[1] === 'string';
}

/**
 * Fetch capability backed by a Roam graph.
 * Blocks come back with their whole subtree; pages use their title as text.
 */
export class RoamGraphFetcher implements FetchCapability {
  constructor(private graph: Graph) {}

  /**
   * Any UID the store accepts is looked up, including custom ones shorter
   * than generated UIDs. Query failures propagate.
   */
  async fetchById(uid: string): Promise<Block | null> {
    if (uid.trim() === '') {
      return null;
    }

    const rows: unknown = await q(this.graph, BLOCK_QUERY, [uid]);
    if (!Array.isArray(rows) || rows.length === 0 || !isBlockRow(rows[0])) {
      return null;
    }
    const [text, heading, view, open] = rows[0];

    return this.fetchTree({
      ':block/uid': uid,
      ':block/string': text,
      ':block/heading': heading,
      ...viewAndOpen(view, open),
    });
  }

  async fetchPage(title: string): Promise<Block | null> {
    const uid: unknown = await q(this.graph, PAGE_UID_QUERY, [title]);
    if (typeof uid !== 'string' || uid === '') {
      return null;
    }

    return this.fetchTree({ ':block/uid': uid, ':node/title': title });
  }

  async fetchReferences(uid: string): Promise<Block[]> {
    const rows: unknown = await q(this.graph, REFERENCES_QUERY, [ANCESTOR_RULE, uid]);
    if (!Array.isArray(rows)) {
      return [];
    }
    return rows
      .filter(isReferenceRow)
      .map(([refUid, text]) => parseExistingBlock({ ':block/uid': refUid, ':block/string': text }));
  }

  private async fetchTree(root: RoamApiBlock): Promise<Block> {
    const rootUid = root[':block/uid'] ?? '';
    const rows: unknown = await q(this.graph, DESCENDANTS_QUERY, [ANCESTOR_RULE, rootUid]);
    const descendants = Array.isArray(rows) ? rows.filter(isDescendantRow) : [];

    // First pass: create all block objects
    const byUid = new Map<string, RoamApiBlock>([[rootUid, { ...root, ':block/children': [] }]]);
    for (const [uid, text, order, heading, view, open] of descendants) {
      byUid.set(uid, {
        ':block/uid': uid,
        ':block/string': text,
        ':block/order': order,
        ':block/heading': heading,
        ...viewAndOpen(view, open),
        ':block/children': [],
      });
    }

    // Second pass: build parent-child relationships
    for (const [uid, , , , , , parentUid] of descendants) {
      const child = byUid.get(uid);
      const parent = byUid.get(parentUid);
      if (child && parent && child !== parent) {
        parent[':block/children']?.push(child);
      }
    }

    const rootBlock = byUid.get(rootUid) ?? root;
    return parseExistingBlock(rootBlock);
  }
}

/**
 * Create a fetcher for the graph configured in the environment.
 */
export function createFetcherFromEnv(env: Record<string, string | undefined> = process.env): RoamGraphFetcher {
  const { apiToken, graphName } = validateEnvironment(env);
  return new RoamGraphFetcher(initializeGraph({ token: apiToken, graph: graphName }));
}
