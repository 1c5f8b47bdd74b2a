/**
 * Single-clause equality filter: `attribute eq "value"`.
 *
 * The grammar is deliberately tiny. Anything outside it (other operators,
 * `and`/`or`, nested paths, garbage) parses to `null` and the caller treats
 * that as "no filtering applied".
 */

export interface EqualityFilter {
  attribute: string;
  value: string;
}

const EQ_FILTER_PATTERN =
  /^\s*([A-Za-z][A-Za-z0-9_-]*)\s+[eE][qQ]\s+(?:"([^"]*)"|'([^']*)'|([^\s"']+))\s*$/;

/** Parse a filter string; returns null for anything that is not one `eq` clause. */
export function parseEqualityFilter(filter: string | undefined): EqualityFilter | null {
  if (!filter) return null;
  const match = EQ_FILTER_PATTERN.exec(filter);
  if (!match) return null;
  const [, attribute, doubleQuoted, singleQuoted, bare] = match;
  const value = doubleQuoted ?? singleQuoted ?? bare;
  if (attribute === undefined || value === undefined) return null;
  return { attribute, value };
}

function matchesValue(stored: unknown, expected: string): boolean {
  if (typeof stored === 'string') return stored === expected;
  if (typeof stored === 'boolean' || typeof stored === 'number') return String(stored) === expected;
  return false;
}

export class FilterMatcher {
  private readonly parsed: EqualityFilter | null;

  constructor(filter?: string) {
    this.parsed = parseEqualityFilter(filter);
  }

  /** True when the filter string was understood and will narrow results. */
  get isActive(): boolean {
    return this.parsed !== null;
  }

  get clause(): EqualityFilter | null {
    return this.parsed;
  }

  matches(attributes: Record<string, unknown>): boolean {
    if (!this.parsed) return true;
    if (!Object.prototype.hasOwnProperty.call(attributes, this.parsed.attribute)) return false;
    return matchesValue(attributes[this.parsed.attribute], this.parsed.value);
  }

  apply<T>(resources: T[], toAttributes: (resource: T) => Record<string, unknown>): T[] {
    if (!this.parsed) return resources;
    return resources.filter((resource) => this.matches(toAttributes(resource)));
  }
}
