/**
 * Ledger schema - statically declared datasets and columns
 *
 * Incoming records are checked against these declarations; an identifier
 * that is not declared is an UnsupportedSchemaError, never a silent drop.
 *
 * @module storage/schema
 */

import type { Variant } from '../types/index.js';
import { UnsupportedSchemaError } from '../errors/index.js';

/**
 * - `id`: reference to another entity (string)
 * - `date`: YYYYMMDD integer
 * - `integer`: amounts in cents, sort orders
 */
export type ColumnType = 'id' | 'string' | 'integer' | 'number' | 'boolean' | 'date';

export interface ColumnDef {
  dataset: string;
  name: string;
  type: ColumnType;
}

export type DatasetDeclaration = Record<string, ColumnType>;

export const LEDGER_DATASETS = {
  accounts: {
    id: 'id',
    name: 'string',
    offbudget: 'boolean',
    closed: 'boolean',
    sort_order: 'number',
    account_id: 'string',
    account_sync_source: 'string',
    balance_current: 'integer',
    balance_available: 'integer',
    balance_limit: 'integer',
    mask: 'string',
    official_name: 'string',
    type: 'string',
    subtype: 'string',
    bank: 'id',
    tombstone: 'boolean',
  },
  payees: {
    id: 'id',
    name: 'string',
    category: 'id',
    transfer_acct: 'id',
    tombstone: 'boolean',
  },
  payee_mapping: {
    id: 'id',
    targetId: 'id',
  },
  category_groups: {
    id: 'id',
    name: 'string',
    is_income: 'boolean',
    sort_order: 'number',
    hidden: 'boolean',
    tombstone: 'boolean',
  },
  categories: {
    id: 'id',
    name: 'string',
    is_income: 'boolean',
    cat_group: 'id',
    sort_order: 'number',
    hidden: 'boolean',
    tombstone: 'boolean',
  },
  transactions: {
    id: 'id',
    isParent: 'boolean',
    isChild: 'boolean',
    parent_id: 'id',
    acct: 'id',
    category: 'id',
    amount: 'integer',
    description: 'id',
    notes: 'string',
    date: 'date',
    financial_id: 'string',
    imported_description: 'string',
    starting_balance_flag: 'boolean',
    transferred_id: 'id',
    sort_order: 'number',
    cleared: 'boolean',
    reconciled: 'boolean',
    pending: 'boolean',
    schedule: 'id',
    error: 'string',
    tombstone: 'boolean',
  },
  notes: {
    id: 'id',
    note: 'string',
  },
} satisfies Record<string, DatasetDeclaration>;

export type LedgerDataset = keyof typeof LEDGER_DATASETS;

function matchesType(type: ColumnType, value: Variant): boolean {
  if (value === null) return true;
  switch (type) {
    case 'id':
    case 'string':
      return typeof value === 'string';
    case 'boolean':
      return typeof value === 'boolean';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'integer':
    case 'date':
      return typeof value === 'number' && Number.isSafeInteger(value);
  }
}

/**
 * Resolves dataset and column identifiers against a fixed declaration
 */
export class SchemaRegistry {
  private datasets = new Map<string, Map<string, ColumnDef>>();

  constructor(declarations: Record<string, DatasetDeclaration> = LEDGER_DATASETS) {
    for (const [dataset, columns] of Object.entries(declarations)) {
      if (columns.id !== 'id') {
        throw new Error(`Dataset '${dataset}' must declare an 'id' column of type id`);
      }
      const defs = new Map<string, ColumnDef>();
      for (const [name, type] of Object.entries(columns)) {
        defs.set(name, { dataset, name, type });
      }
      this.datasets.set(dataset, defs);
    }
  }

  hasDataset(dataset: string): boolean {
    return this.datasets.has(dataset);
  }

  resolveColumn(dataset: string, name: string): ColumnDef | null {
    return this.datasets.get(dataset)?.get(name) ?? null;
  }

  columns(dataset: string): ColumnDef[] {
    return Array.from(this.datasets.get(dataset)?.values() ?? []);
  }

  datasetNames(): string[] {
    return Array.from(this.datasets.keys());
  }

  /**
   * @throws {UnsupportedSchemaError} when the dataset or column is undeclared
   */
  requireColumn(dataset: string, name: string): ColumnDef {
    if (!this.datasets.has(dataset)) {
      throw new UnsupportedSchemaError(dataset);
    }
    const column = this.resolveColumn(dataset, name);
    if (!column) {
      throw new UnsupportedSchemaError(dataset, name);
    }
    return column;
  }

  accepts(column: ColumnDef, value: Variant): boolean {
    return matchesType(column.type, value);
  }
}
