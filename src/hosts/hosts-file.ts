/**
 * Hosts File Text Operations
 *
 * Pure functions over the content of a hosts table. Lines are kept with their
 * own terminators so that everything outside the managed block survives a
 * rewrite byte for byte.
 */

import { HOSTS_BLOCK_BEGIN, HOSTS_BLOCK_END, LOOPBACK_ADDRESS } from '../config/constants.js';
import { isUnderSuffix, type DomainSet } from './domains.js';

// =============================================================================
// TYPES
// =============================================================================

export interface HostsTableEntry {
  domain: string;
  address: string;
  /** True when the line sits inside a marker-bounded block */
  managed: boolean;
}

export interface StripResult {
  content: string;
  removed: HostsTableEntry[];
  blocks: number;
}

interface RawLine {
  raw: string;
  text: string;
}

// =============================================================================
// LINE HANDLING
// =============================================================================

function splitRawLines(content: string): RawLine[] {
  const pieces = content.match(/[^\n]*\n|[^\n]+$/g) ?? [];
  return pieces.map((raw) => ({ raw, text: raw.replace(/\r?\n$/, '') }));
}

export function detectEol(content: string): '\r\n' | '\n' {
  return content.includes('\r\n') ? '\r\n' : '\n';
}

function isBeginMarker(text: string): boolean {
  // Older blocks carried a generation timestamp after the marker
  return text.trim().startsWith(HOSTS_BLOCK_BEGIN);
}

function isEndMarker(text: string): boolean {
  return text.trim().startsWith(HOSTS_BLOCK_END);
}

/**
 * Parses `address host [host...]  # comment`. Returns null for blank and
 * comment-only lines.
 */
export function parseHostsLine(text: string): { address: string; hostnames: string[] } | null {
  const body = text.split('#')[0]?.trim() ?? '';
  if (!body) {
    return null;
  }
  const [address, ...hostnames] = body.split(/\s+/);
  if (!address || hostnames.length === 0) {
    return null;
  }
  return { address, hostnames };
}

/**
 * Indices of lines that belong to managed blocks (markers included).
 *
 * A begin marker without an end marker only claims itself and the directly
 * following entries under the suffix, never the rest of the file.
 */
function managedLineIndices(lines: RawLine[], suffix: string): Set<number> {
  const managed = new Set<number>();
  let i = 0;

  while (i < lines.length) {
    const line = lines[i];
    if (!line || !isBeginMarker(line.text)) {
      i++;
      continue;
    }

    let end = -1;
    for (let j = i + 1; j < lines.length; j++) {
      const candidate = lines[j];
      if (candidate && isBeginMarker(candidate.text)) {
        break;
      }
      if (candidate && isEndMarker(candidate.text)) {
        end = j;
        break;
      }
    }

    if (end >= 0) {
      for (let k = i; k <= end; k++) {
        managed.add(k);
      }
      i = end + 1;
      continue;
    }

    managed.add(i);
    let k = i + 1;
    while (k < lines.length) {
      const parsed = parseHostsLine(lines[k]?.text ?? '');
      if (!parsed || !parsed.hostnames.every((host) => isUnderSuffix(host, suffix))) {
        break;
      }
      managed.add(k);
      k++;
    }
    i = k;
  }

  return managed;
}

// =============================================================================
// QUERIES
// =============================================================================

/**
 * Lists every mapping for a domain under the suffix, flagging whether it is
 * owned by a managed block.
 */
export function findSuffixEntries(content: string, suffix: string): HostsTableEntry[] {
  const lines = splitRawLines(content);
  const managed = managedLineIndices(lines, suffix);
  const entries: HostsTableEntry[] = [];

  lines.forEach((line, index) => {
    const parsed = parseHostsLine(line.text);
    if (!parsed) {
      return;
    }
    for (const host of parsed.hostnames) {
      if (isUnderSuffix(host, suffix)) {
        entries.push({ domain: host.toLowerCase(), address: parsed.address, managed: managed.has(index) });
      }
    }
  });

  return entries;
}

// =============================================================================
// MUTATIONS
// =============================================================================

/**
 * Removes every managed block, leaving all other lines untouched.
 */
export function stripManagedBlocks(content: string, suffix: string): StripResult {
  const lines = splitRawLines(content);
  const managed = managedLineIndices(lines, suffix);
  const removed: HostsTableEntry[] = [];
  let blocks = 0;
  let kept = '';

  lines.forEach((line, index) => {
    if (!managed.has(index)) {
      kept += line.raw;
      return;
    }
    if (isBeginMarker(line.text)) {
      blocks++;
    }
    const parsed = parseHostsLine(line.text);
    for (const host of parsed?.hostnames ?? []) {
      removed.push({ domain: host.toLowerCase(), address: parsed?.address ?? '', managed: true });
    }
  });

  return { content: kept, removed, blocks };
}

/**
 * Renders the managed block for a domain set.
 */
export function renderManagedBlock(domains: DomainSet, eol: string): string {
  const lines = [
    HOSTS_BLOCK_BEGIN,
    ...domains.map((domain) => `${LOOPBACK_ADDRESS}    ${domain}`),
    HOSTS_BLOCK_END,
  ];
  return lines.join(eol) + eol;
}

/**
 * Replaces any managed block with a fresh one listing `domains`.
 * Applying it twice yields the same content as applying it once.
 */
export function applyDomainSet(content: string, domains: DomainSet, suffix: string): string {
  const eol = detectEol(content);
  const stripped = stripManagedBlocks(content, suffix).content;
  const base = stripped.length > 0 && !stripped.endsWith('\n') ? stripped + eol : stripped;
  return base + renderManagedBlock(domains, eol);
}
