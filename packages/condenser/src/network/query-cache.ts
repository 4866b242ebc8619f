import { canonicalize } from '../utils/canonical.js';
import type { QueryResult, ReachabilityQuery } from './query-engine.js';

/**
 * Query results keyed by topology fingerprint and canonical query.
 *
 * Results are copied in and out, so a caller that edits what it got back
 * cannot change what later hits see.
 */
export class QueryCache {
  private readonly entries = new Map<string, Map<string, QueryResult>>();

  get(fingerprint: string, query: ReachabilityQuery): QueryResult | null {
    const stored = this.entries.get(fingerprint)?.get(canonicalize(query));
    return stored ? structuredClone(stored) : null;
  }

  set(fingerprint: string, query: ReachabilityQuery, result: QueryResult): void {
    let forTopology = this.entries.get(fingerprint);
    if (!forTopology) {
      forTopology = new Map();
      this.entries.set(fingerprint, forTopology);
    }
    forTopology.set(canonicalize(query), structuredClone(result));
  }

  /** Drop every result computed for one topology. */
  invalidate(fingerprint: string): void {
    this.entries.delete(fingerprint);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    let total = 0;
    for (const forTopology of this.entries.values()) total += forTopology.size;
    return total;
  }
}
