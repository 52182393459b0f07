/**
 * Type Lattice - Declared type normalization and promotion
 *
 * Maps catalog type strings onto the closed WarehouseType set and defines the
 * promotion policy used when tenants disagree on a field's type.
 *
 * Promotion rules:
 * - identical types join to themselves
 * - INT64 < NUMERIC < BIGNUMERIC < FLOAT64 join to the wider member
 * - every other pair joins to STRING
 * - opaque types (STRUCT, RANGE) always resolve to STRING
 *
 * @module packages/consolidation/services/type-lattice
 */

import type { WarehouseType } from '@silvermerge/core/domain';
import {
  WAREHOUSE_TYPES,
  ConsolidationError,
  ConsolidationErrorCode,
} from '@silvermerge/core/domain';

// =============================================================================
// Types
// =============================================================================

export interface NormalizedType {
  type: WarehouseType;
  isRepeated: boolean;
  /** Member declarations of a STRUCT, in declaration order */
  members: StructMember[];
}

export interface StructMember {
  name: string;
  dataType: string;
}

// =============================================================================
// Constants
// =============================================================================

const TYPE_ALIASES: Readonly<Partial<Record<string, WarehouseType>>> = {
  INTEGER: 'INT64',
  INT: 'INT64',
  SMALLINT: 'INT64',
  BIGINT: 'INT64',
  TINYINT: 'INT64',
  BYTEINT: 'INT64',
  FLOAT: 'FLOAT64',
  BOOLEAN: 'BOOL',
  DECIMAL: 'NUMERIC',
  BIGDECIMAL: 'BIGNUMERIC',
  RECORD: 'STRUCT',
};

/** Numeric widening chain, narrowest first */
const NUMERIC_CHAIN: readonly WarehouseType[] = ['INT64', 'NUMERIC', 'BIGNUMERIC', 'FLOAT64'];

const OPAQUE_TYPES: ReadonlySet<WarehouseType> = new Set<WarehouseType>(['STRUCT', 'RANGE']);

/** Types that can only become STRING through JSON text */
export const JSON_TEXT_TYPES: ReadonlySet<WarehouseType> = new Set<WarehouseType>([
  'JSON',
  'STRUCT',
  'RANGE',
  'GEOGRAPHY',
]);

export const DATE_LIKE_TYPES: ReadonlySet<WarehouseType> = new Set<WarehouseType>([
  'DATE',
  'DATETIME',
  'TIMESTAMP',
]);

// =============================================================================
// Normalization
// =============================================================================

function isWarehouseType(value: string): value is WarehouseType {
  return WAREHOUSE_TYPES.some((type) => type === value);
}

/**
 * Split a comma-separated list at depth zero of <> and ().
 */
function splitTopLevel(input: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';

  for (const char of input) {
    if (char === '<' || char === '(') depth++;
    if (char === '>' || char === ')') depth--;

    if (char === ',' && depth === 0) {
      parts.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  if (current.trim().length > 0) {
    parts.push(current.trim());
  }
  return parts;
}

function parseStructMembers(body: string, raw: string): StructMember[] {
  return splitTopLevel(body).map((declaration) => {
    const match = /^(`[^`]+`|[A-Za-z_][A-Za-z0-9_]*)\s+(.+)$/s.exec(declaration);
    if (!match) {
      throw new ConsolidationError(
        ConsolidationErrorCode.UNSUPPORTED_TYPE,
        `Malformed STRUCT member "${declaration}" in ${raw}`,
        { dataType: raw }
      );
    }
    return { name: match[1].replace(/`/g, ''), dataType: match[2].trim() };
  });
}

/**
 * Normalize a declared type string from the catalog.
 *
 * @throws ConsolidationError(UNSUPPORTED_TYPE) for names outside the closed set
 */
export function normalizeDeclaredType(raw: string): NormalizedType {
  const trimmed = raw.trim();
  const upper = trimmed.toUpperCase();

  if (upper.startsWith('ARRAY<') && upper.endsWith('>')) {
    const element = normalizeDeclaredType(trimmed.slice('ARRAY<'.length, -1));
    return { ...element, isRepeated: true };
  }

  if (upper.startsWith('STRUCT<') && upper.endsWith('>')) {
    return {
      type: 'STRUCT',
      isRepeated: false,
      members: parseStructMembers(trimmed.slice('STRUCT<'.length, -1), raw),
    };
  }

  if (upper.startsWith('RANGE<')) {
    return { type: 'RANGE', isRepeated: false, members: [] };
  }

  // NUMERIC(10,2), STRING(64), BYTES(16)
  const base = upper.replace(/\(.*\)$/, '').trim();
  const type = TYPE_ALIASES[base] ?? (isWarehouseType(base) ? base : null);

  if (type === null) {
    throw new ConsolidationError(
      ConsolidationErrorCode.UNSUPPORTED_TYPE,
      `Unsupported column type: ${raw}`,
      { dataType: raw }
    );
  }

  return { type, isRepeated: false, members: [] };
}

// =============================================================================
// Promotion
// =============================================================================

/**
 * Join two types. Total, commutative and associative.
 */
export function widen(a: WarehouseType, b: WarehouseType): WarehouseType {
  if (OPAQUE_TYPES.has(a) || OPAQUE_TYPES.has(b)) {
    return 'STRING';
  }
  if (a === b) {
    return a;
  }

  const rankA = NUMERIC_CHAIN.indexOf(a);
  const rankB = NUMERIC_CHAIN.indexOf(b);
  if (rankA >= 0 && rankB >= 0) {
    return NUMERIC_CHAIN[Math.max(rankA, rankB)];
  }

  return 'STRING';
}

/**
 * Resolve the target type of a field from every declared type.
 */
export function resolveTargetType(types: readonly WarehouseType[]): WarehouseType {
  if (types.length === 0) {
    return 'STRING';
  }
  const joined = types.reduce((acc, type) => widen(acc, type));
  return isOpaque(joined) ? 'STRING' : joined;
}

/**
 * Opaque types have an inner layout the lattice cannot compare.
 */
export function isOpaque(type: WarehouseType): boolean {
  return OPAQUE_TYPES.has(type);
}
