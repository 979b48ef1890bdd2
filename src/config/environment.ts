import * as dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { existsSync } from 'fs';
import type { OutputMode } from '../format/formatter.js';
import { DEFAULT_MATCH_THRESHOLD } from '../diff/diff.js';

// src/config -> project root
const projectRoot = dirname(dirname(dirname(fileURLToPath(import.meta.url))));

// Try to load .env from project root
const envPath = join(projectRoot, '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

export const DEFAULT_REF_LEVEL = 1;

export interface SyncConfig {
  apiToken?: string;
  graphName?: string;
  /** Minimum similarity for a content match */
  matchThreshold: number;
  /** Default reference resolution depth for rendering */
  refLevel: number;
  outputMode: OutputMode;
  debug: boolean;
}

type Env = Record<string, string | undefined>;

/**
 * Read sync settings from environment variables.
 * Unset variables fall back to defaults; malformed ones are reported together.
 */
export function loadSyncConfig(env: Env = process.env): SyncConfig {
  const problems: string[] = [];

  let matchThreshold = DEFAULT_MATCH_THRESHOLD;
  const rawThreshold = env.SYNC_MATCH_THRESHOLD?.trim();
  if (rawThreshold) {
    const value = Number(rawThreshold);
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      problems.push(`SYNC_MATCH_THRESHOLD must be a number between 0 and 1 (got "${rawThreshold}")`);
    } else {
      matchThreshold = value;
    }
  }

  let refLevel = DEFAULT_REF_LEVEL;
  const rawLevel = env.SYNC_REF_LEVEL?.trim();
  if (rawLevel) {
    const value = Number(rawLevel);
    if (!Number.isInteger(value) || value < 0) {
      problems.push(`SYNC_REF_LEVEL must be a non-negative integer (got "${rawLevel}")`);
    } else {
      refLevel = value;
    }
  }

  let outputMode: OutputMode = 'hierarchical';
  const rawMode = env.SYNC_OUTPUT_MODE?.trim().toLowerCase();
  if (rawMode) {
    if (rawMode === 'hierarchical' || rawMode === 'flat') {
      outputMode = rawMode;
    } else {
      problems.push(`SYNC_OUTPUT_MODE must be "hierarchical" or "flat" (got "${rawMode}")`);
    }
  }

  if (problems.length > 0) {
    throw new Error(`Invalid sync configuration:\n  - ${problems.join('\n  - ')}`);
  }

  const debugFlag = env.SYNC_DEBUG?.trim().toLowerCase();

  return {
    apiToken: env.ROAM_API_TOKEN || undefined,
    graphName: env.ROAM_GRAPH_NAME || undefined,
    matchThreshold,
    refLevel,
    outputMode,
    debug: debugFlag === 'true' || debugFlag === '1',
  };
}

/**
 * Validate that graph credentials are configured.
 * Called before connecting to a graph.
 */
export function validateEnvironment(env: Env = process.env): { apiToken: string; graphName: string } {
  const apiToken = env.ROAM_API_TOKEN;
  const graphName = env.ROAM_GRAPH_NAME;

  if (!apiToken || !graphName) {
    const missingVars: string[] = [];
    if (!apiToken) missingVars.push('ROAM_API_TOKEN');
    if (!graphName) missingVars.push('ROAM_GRAPH_NAME');

    throw new Error(
      `Missing required environment variables: ${missingVars.join(', ')}\n\n` +
      'Configure them either:\n' +
      '1. In the environment of the calling process\n' +
      '2. Or in a .env file in the project root:\n' +
      '   ROAM_API_TOKEN=your-api-token\n' +
      '   ROAM_GRAPH_NAME=your-graph-name'
    );
  }

  return { apiToken, graphName };
}
