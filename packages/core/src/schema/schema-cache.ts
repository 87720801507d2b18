/**
 * Per-record field metadata, computed once per record identity.
 *
 * Entries are keyed by descriptor identity in a WeakMap, so a record that is
 * no longer referenced drops its entry. Concurrent readers see either no
 * entry or a complete, frozen one.
 */

import {
  isFieldDescriptor,
  type Descriptor,
  type RecordDescriptor,
} from '../types/descriptor.js';
import { parseTag } from './tags.js';

export interface ResolvedField {
  /** Declared identifier in the record's field map */
  readonly key: string;
  /** Wire name after tag resolution */
  readonly name: string;
  readonly omitIfEmpty: boolean;
  readonly ignore: boolean;
  readonly descriptor: Descriptor;
}

interface CacheEntry {
  readonly fields: readonly ResolvedField[];
  readonly byName: ReadonlyMap<string, ResolvedField>;
}

export interface SchemaCacheStats {
  hits: number;
  misses: number;
}

export class SchemaCache {
  private readonly entries = new WeakMap<RecordDescriptor, CacheEntry>();
  private readonly stats: SchemaCacheStats = { hits: 0, misses: 0 };

  /**
   * Resolved fields in declaration order, ignored fields included.
   */
  fieldsOf(record: RecordDescriptor): readonly ResolvedField[] {
    return this.entryFor(record).fields;
  }

  /**
   * Non-ignored field whose wire name matches exactly. When several fields
   * share a name the first declared one wins.
   */
  lookup(record: RecordDescriptor, name: string): ResolvedField | undefined {
    return this.entryFor(record).byName.get(name);
  }

  /** Wire names of the non-ignored fields, in declaration order */
  namesOf(record: RecordDescriptor): string[] {
    return this.fieldsOf(record)
      .filter((field) => !field.ignore)
      .map((field) => field.name);
  }

  has(record: RecordDescriptor): boolean {
    return this.entries.has(record);
  }

  getStats(): SchemaCacheStats {
    return { ...this.stats };
  }

  private entryFor(record: RecordDescriptor): CacheEntry {
    const cached = this.entries.get(record);
    if (cached) {
      this.stats.hits += 1;
      return cached;
    }
    this.stats.misses += 1;
    const entry = buildEntry(record);
    this.entries.set(record, entry);
    return entry;
  }
}

function buildEntry(record: RecordDescriptor): CacheEntry {
  const fields: ResolvedField[] = [];
  const byName = new Map<string, ResolvedField>();

  for (const [key, spec] of Object.entries(record.fields)) {
    const tag = parseTag(isFieldDescriptor(spec) ? spec.tag : '');
    const resolved: ResolvedField = Object.freeze({
      key,
      name: tag.name === '' && !tag.ignore ? key : tag.name,
      omitIfEmpty: tag.omitIfEmpty,
      ignore: tag.ignore,
      descriptor: isFieldDescriptor(spec) ? spec.descriptor : spec,
    });
    fields.push(resolved);
    if (!resolved.ignore && !byName.has(resolved.name)) {
      byName.set(resolved.name, resolved);
    }
  }

  return Object.freeze({ fields: Object.freeze(fields), byName });
}

/** Process-wide cache used by the module-level helpers */
export const defaultSchemaCache = new SchemaCache();
