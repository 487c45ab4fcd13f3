import { stringify } from 'smol-toml';
import type { Condition } from '../conditions/conditions.js';
import type { ExportItem } from '../exports/types.js';
import type { ExpressionChain, ExpressionItem, ListOp, OpItem, StrOp } from '../expressions/types.js';
import type { SourceItem } from '../sources/types.js';
import type { TransformItem } from '../transforms/types.js';
import type { Config, Loader } from '../types.js';

export type DocumentValue = string | number | boolean | Document | readonly DocumentValue[];

/** Optional fields are omitted rather than written as undefined. */
export interface Document {
  readonly [key: string]: DocumentValue | undefined;
}

function serializeItem(item: ExpressionItem): Document {
  switch (item.type) {
    case 'and':
    case 'or':
      return { type: item.type, conditions: item.conditions.map(serializeChain) };
    case 'not':
      return { type: 'not', expr: serializeChain(item.expr) };
    case 'as_struct':
      return { type: 'as_struct', fields: item.fields.map(serializeChain) };
    case 'concat_str':
      return {
        type: 'concat_str',
        columns: item.columns.map(serializeChain),
        separator: item.separator,
        ignore_nulls: item.ignoreNulls,
      };
    case 'condition':
      return {
        type: 'condition',
        when: serializeChain(item.when),
        then: serializeChain(item.then),
        otherwise: serializeChain(item.otherwise),
      };
    default:
      return item;
  }
}

function serializeStrOp(op: StrOp): Document {
  switch (op.type) {
    case 'strip_chars':
      return { type: 'strip_chars', ...(op.characters !== undefined && { characters: op.characters }) };
    case 'slice':
      return { type: 'slice', offset: op.offset, ...(op.length !== undefined && { length: op.length }) };
    case 'pad_start':
      return { type: 'pad_start', length: op.length, fill_char: op.fillChar };
    default:
      return op;
  }
}

function serializeListOp(op: ListOp): Document {
  switch (op.type) {
    case 'contains':
      return { type: 'contains', item: serializeChain(op.item) };
    case 'eval':
      return { type: 'eval', expr: serializeChain(op.expr) };
    default:
      return op;
  }
}

function serializeOp(op: OpItem): Document {
  switch (op.type) {
    case 'fill_null':
      return { type: 'fill_null', value: serializeChain(op.value) };
    case 'eq':
    case 'neq':
    case 'gt':
    case 'lt':
    case 'gt_eq':
    case 'lt_eq':
    case 'add':
    case 'sub':
    case 'mul':
    case 'div':
      return { type: op.type, other: serializeChain(op.other) };
    case 'and':
    case 'or':
      return { type: op.type, conditions: op.conditions.map(serializeChain) };
    case 'str':
      return { type: 'str', op: serializeStrOp(op.op) };
    case 'list':
      return { type: 'list', op: serializeListOp(op.op) };
    default:
      return op;
  }
}

/** A bare column with no operations is written as its name. */
export function serializeChain(chain: ExpressionChain): DocumentValue {
  if (chain.base.type === 'column' && chain.ops.length === 0) {
    return chain.base.name;
  }
  return {
    ...serializeItem(chain.base),
    ...(chain.ops.length > 0 && { ops: chain.ops.map(serializeOp) }),
  };
}

function serializeCondition(condition: Condition): Document {
  if (condition.type === 'match') return condition;
  return { type: condition.type, conditions: condition.conditions.map(serializeCondition) };
}

function serializeSource(source: SourceItem): Document {
  switch (source.type) {
    case 'csv':
      return {
        type: 'csv',
        path: source.paths,
        has_header: source.hasHeader,
        ...(source.separator !== undefined && { separator: source.separator }),
        ...(source.schema !== undefined && { schema: source.schema }),
      };
    case 'json_line':
    case 'parquet':
      return {
        type: source.type,
        path: source.paths,
        ...(source.schema !== undefined && { schema: source.schema }),
      };
    case 'json':
      return {
        type: 'json',
        path: source.path,
        ...(source.schema !== undefined && { schema: source.schema }),
      };
    case 'config':
      return source;
    case 'inline':
      return {
        type: 'inline',
        columns: source.columns.map((column) => ({
          name: column.name,
          ...(column.datatype !== undefined && { datatype: column.datatype }),
          values: column.values,
        })),
      };
  }
}

function serializeLoader(loader: Loader): Document {
  return {
    ...serializeSource(loader.source),
    ...(loader.transforms.length > 0 && { transforms: loader.transforms.map(serializeTransform) }),
  };
}

function serializeTransform(transform: TransformItem): Document {
  switch (transform.type) {
    case 'select':
    case 'with_columns':
      return { type: transform.type, columns: transform.columns.map(serializeChain) };
    case 'filter':
      return {
        type: 'filter',
        ...(transform.conditions.length > 0 && { conditions: transform.conditions.map(serializeChain) }),
        ...(transform.condition !== undefined && { condition: serializeCondition(transform.condition) }),
      };
    case 'sort_by':
      return { type: 'sort_by', by: transform.by.map((key) => ({ ...key })) };
    case 'join':
      return {
        type: 'join',
        right: serializeLoader(transform.right),
        left_on: transform.leftOn.map(serializeChain),
        right_on: transform.rightOn.map(serializeChain),
        how: transform.how,
      };
    case 'drop_duplicates':
      return {
        type: 'drop_duplicates',
        ...(transform.subset !== undefined && { subset: transform.subset }),
        keep: transform.keep,
      };
    case 'set':
      return { type: 'set', expr: serializeChain(transform.expr) };
    case 'group_by':
      return {
        type: 'group_by',
        keys: transform.keys.map(serializeChain),
        aggregations: transform.aggregations.map(serializeChain),
      };
    case 'concat':
      return { type: 'concat', other: serializeLoader(transform.other), how: transform.how };
    default:
      return transform;
  }
}

function serializeExport({ dateFormat, ...item }: ExportItem): Document {
  return { ...item, ...(dateFormat !== undefined && { date_format: dateFormat }) };
}

/**
 * Maps a configuration back to its document shape. Paths are written as the
 * absolute paths they were resolved to.
 */
export function serializeConfig(config: Config): Document {
  return {
    source: serializeLoader(config.source),
    ...(config.transforms.length > 0 && { transforms: config.transforms.map(serializeTransform) }),
    exports: config.exports.map(serializeExport),
  };
}

export function stringifyConfig(config: Config): string {
  return stringify(serializeConfig(config));
}
