/**
 * Category Domain Registry
 *
 * Computes, once per run, every status and resolution value an entity has
 * ever held: the current legal values in canonical order, then retired or
 * renamed values recovered from the audit trail in first-seen order.
 * The rename table applies to both: a renamed legal value is folded into
 * its target and never becomes a column of its own.
 * The result is read-only and shared by every product worker.
 *
 * @module @trailstats/core/categories
 */

import type { CategoryAliases } from '../config/index.js';
import type { CategoryField, EntityStore } from '../storage/interfaces.js';

export interface Category {
  name: string;
  kind: CategoryField;
  /** False for values only known from history */
  active: boolean;
}

export class CategoryDomain {
  readonly statuses: readonly Category[];
  readonly resolutions: readonly Category[];
  private readonly aliases: CategoryAliases;
  private readonly names: Record<CategoryField, ReadonlySet<string>>;

  constructor(statuses: Category[], resolutions: Category[], aliases: CategoryAliases) {
    this.statuses = Object.freeze([...statuses]);
    this.resolutions = Object.freeze([...resolutions]);
    this.aliases = aliases;
    this.names = {
      status: new Set(statuses.map(c => c.name)),
      resolution: new Set(resolutions.map(c => c.name)),
    };
  }

  /**
   * Column order of every time-series file: statuses then resolutions.
   * The DATE column is implicit.
   */
  columns(): string[] {
    return [...this.statuses, ...this.resolutions].map(c => c.name);
  }

  categories(field: CategoryField): readonly Category[] {
    return field === 'status' ? this.statuses : this.resolutions;
  }

  /**
   * Map a raw value through the rename table
   */
  canonicalize(field: CategoryField, value: string): string {
    return this.aliases[field][value] ?? value;
  }

  /**
   * Raw values counted under a category: the name itself unless it is
   * renamed, plus every value renamed to it
   */
  sourceValues(field: CategoryField, name: string): string[] {
    const renamed = Object.keys(this.aliases[field]).filter(raw => this.aliases[field][raw] === name);
    return this.canonicalize(field, name) === name ? [name, ...renamed] : renamed;
  }

  /**
   * Whether a (canonicalized) value is a counted category of the field
   */
  has(field: CategoryField, value: string): boolean {
    return this.names[field].has(value);
  }
}

const NO_ALIASES: CategoryAliases = { status: {}, resolution: {} };

/**
 * Build the ordered domain of one field
 */
export async function loadFieldDomain(
  store: EntityStore,
  field: CategoryField,
  aliases: CategoryAliases = NO_ALIASES
): Promise<Category[]> {
  const legal = await store.listLegalValues(field);
  const historical = await store.listHistoricalValues(field);
  const renames = aliases[field];

  const seen = new Set<string>();
  const domain: Category[] = [];

  for (const raw of legal) {
    const name = renames[raw] ?? raw;
    if (name === '' || seen.has(name)) continue;
    seen.add(name);
    domain.push({ name, kind: field, active: true });
  }

  for (const raw of historical) {
    const name = renames[raw] ?? raw;
    if (name === '' || seen.has(name)) continue;
    seen.add(name);
    domain.push({ name, kind: field, active: false });
  }

  return domain;
}

/**
 * Load the status and resolution domains for one run
 */
export async function loadCategoryDomain(
  store: EntityStore,
  aliases: CategoryAliases = NO_ALIASES
): Promise<CategoryDomain> {
  const statuses = await loadFieldDomain(store, 'status', aliases);
  const resolutions = await loadFieldDomain(store, 'resolution', aliases);
  return new CategoryDomain(statuses, resolutions, aliases);
}
