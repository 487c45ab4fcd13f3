import pl, { DataType } from 'nodejs-polars';
import { toEngineDataType } from '../engine/datatypes.js';
import { EtlError } from '../errors.js';
import { evaluateChain } from './evaluate.js';
import { assertPattern, captureGroups, literalPattern } from './patterns.js';
import type { ListOp, OpItem, StrOp, StructOp } from './types.js';

/**
 * Builds a struct with one field per capture group, named after the group
 * (or its 1-based index when unnamed).
 */
export function extractGroups(expr: pl.Expr, pattern: string): pl.Expr {
  const groups = captureGroups(assertPattern(pattern));
  if (groups.length === 0) {
    throw new EtlError(`Pattern ${JSON.stringify(pattern)} has no capture groups to extract`);
  }
  return pl.struct(groups.map((g) => expr.str.extract(pattern, g.index).alias(g.name)));
}

function escapeCharacters(characters: string): string {
  return characters.replace(/[\\\]^-]/g, '\\$&');
}

function matchPattern(pattern: string, literal: boolean): string {
  return literal ? literalPattern(pattern) : assertPattern(pattern);
}

function applyStrOp(op: StrOp, expr: pl.Expr): pl.Expr {
  switch (op.type) {
    case 'to_lowercase':
      return expr.str.toLowerCase();
    case 'to_uppercase':
      return expr.str.toUpperCase();
    case 'strip_chars': {
      const set = op.characters === undefined ? '\\s' : escapeCharacters(op.characters);
      return expr.str.replaceAll(`^[${set}]+|[${set}]+$`, '');
    }
    case 'replace': {
      const pattern = matchPattern(op.pattern, op.literal);
      // `$` in a replacement refers to a capture group
      const value = op.literal ? op.value.replace(/\$/g, '$$$$') : op.value;
      return op.all ? expr.str.replaceAll(pattern, value) : expr.str.replace(pattern, value);
    }
    case 'slice':
      return expr.str.slice(op.offset, op.length ?? pl.lit(null));
    case 'split':
      return expr.str.split(op.by);
    case 'strptime':
      return op.dtype === 'Date'
        ? expr.str.strptime(DataType.Date, op.format)
        : expr.str.strptime(DataType.Datetime('ms'), op.format);
    case 'extract':
      return expr.str.extract(assertPattern(op.pattern), op.group);
    case 'pad_start':
      return expr.str.padStart(op.length, op.fillChar);
    case 'json_path_match':
      return expr.str.jsonPathMatch(op.path);
  }
}

function applyListOp(op: ListOp, expr: pl.Expr): pl.Expr {
  switch (op.type) {
    case 'get':
      return expr.lst.get(op.index);
    case 'join':
      return expr.lst.join(op.separator);
    case 'first':
      return expr.lst.first();
    case 'last':
      return expr.lst.last();
    case 'lengths':
      return expr.lst.lengths();
    case 'contains':
      return expr.lst.contains(evaluateChain(op.item));
    case 'unique':
      return expr.lst.unique();
    case 'eval':
      return expr.lst.eval(evaluateChain(op.expr));
  }
}

function applyStructOp(op: StructOp, expr: pl.Expr): pl.Expr {
  switch (op.type) {
    case 'field':
      return expr.struct.field(op.name);
    case 'rename_fields':
      return expr.struct.renameFields([...op.names]);
  }
}

/** Applies one operation to the expression built so far. */
export function applyOp(op: OpItem, expr: pl.Expr): pl.Expr {
  switch (op.type) {
    case 'alias':
      return expr.alias(op.name);
    case 'cast':
      return expr.cast(toEngineDataType(op.dtype), op.strict);
    case 'extract_groups':
      return extractGroups(expr, op.pattern);
    case 'drop_null':
      return expr.filter(expr.isNotNull());
    case 'fill_null':
      return expr.fillNull(evaluateChain(op.value));
    case 'contains':
      return expr.str.contains(matchPattern(op.pattern, op.literal));
    case 'is_null':
      return op.value ? expr.isNull() : expr.isNotNull();
    case 'eq':
      return expr.eq(evaluateChain(op.other));
    case 'neq':
      return expr.neq(evaluateChain(op.other));
    case 'gt':
      return expr.gt(evaluateChain(op.other));
    case 'lt':
      return expr.lt(evaluateChain(op.other));
    case 'gt_eq':
      return expr.gtEq(evaluateChain(op.other));
    case 'lt_eq':
      return expr.ltEq(evaluateChain(op.other));
    case 'and':
      return op.conditions.reduce((acc, chain) => acc.and(evaluateChain(chain)), expr);
    case 'or':
      return op.conditions.reduce((acc, chain) => acc.or(evaluateChain(chain)), expr);
    case 'add':
      return expr.plus(evaluateChain(op.other));
    case 'sub':
      return expr.minus(evaluateChain(op.other));
    case 'mul':
      return expr.multiplyBy(evaluateChain(op.other));
    case 'div':
      return expr.divideBy(evaluateChain(op.other));
    case 'str':
      return applyStrOp(op.op, expr);
    case 'list':
      return applyListOp(op.op, expr);
    case 'struct':
      return applyStructOp(op.op, expr);
  }
}
