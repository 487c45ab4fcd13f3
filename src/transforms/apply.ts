import pl from 'nodejs-polars';
import { evaluateCondition } from '../conditions/conditions.js';
import { loadLoader } from '../config/load.js';
import { isStruct, planSchema } from '../engine/datatypes.js';
import { EngineError, EtlError } from '../errors.js';
import { evaluateChain } from '../expressions/evaluate.js';
import { assertPattern, captureGroups } from '../expressions/patterns.js';
import type { ResolveContext } from '../context.js';
import type { ExpressionChain } from '../expressions/types.js';
import type { DuplicateKeep, JoinHow, TransformItem } from './types.js';

type Plan = pl.LazyDataFrame;

function extract(plan: Plan, column: string, pattern: string, filter: boolean): Plan {
  const groups = captureGroups(assertPattern(pattern));
  if (groups.length === 0) {
    throw new EtlError(`Pattern ${JSON.stringify(pattern)} has no capture groups to extract`);
  }
  const source = pl.col(column);
  const rows = filter ? plan.filter(source.str.contains(pattern)) : plan;
  return rows.withColumns(...groups.map((g) => source.str.extract(pattern, g.index).alias(g.name)));
}

function dropDuplicates(plan: Plan, subset: readonly string[] | undefined, keep: DuplicateKeep): Plan {
  const columns = subset === undefined ? plan.columns : [...subset];
  switch (keep) {
    case 'first':
    case 'last':
      return plan.unique({ subset: columns, keep, maintainOrder: true });
    case 'any':
      return plan.unique({ subset: columns, keep: 'first', maintainOrder: false });
    case 'none': {
      const [first, ...rest] = columns;
      if (first === undefined) return plan;
      return plan.filter(pl.len().over(first, ...rest).eq(1));
    }
  }
}

/** Replaces each struct column with its fields, in place. */
function unnest(plan: Plan, columns: readonly string[]): Plan {
  const schema = planSchema(plan);
  const missing = columns.filter((column) => !schema.some(({ name }) => name === column));
  if (missing.length > 0) {
    throw new EtlError(`Cannot unnest missing column(s): ${missing.join(', ')}`);
  }
  const targets = new Set(columns);
  const selection = schema.flatMap(({ name, dtype }) => {
    if (!targets.has(name)) return [pl.col(name)];
    if (!isStruct(dtype)) {
      throw new EtlError(`Cannot unnest "${name}": it is not a struct column`);
    }
    return dtype.inner.map((field) => pl.col(name).struct.field(field.name));
  });
  return plan.select(...selection);
}

interface JoinKeys {
  plan: Plan;
  names: string[];
  /** Key columns added for the join, removed again afterwards */
  added: string[];
}

function keyColumn(chain: ExpressionChain): string | undefined {
  const { base } = chain;
  return chain.ops.length === 0 && base.type === 'column' && base.name !== '*' ? base.name : undefined;
}

/** Joins take column names: computed keys are added to the plan under a reserved name first. */
function joinKeys(plan: Plan, keys: readonly ExpressionChain[], side: 'left' | 'right'): JoinKeys {
  const names: string[] = [];
  const added: string[] = [];
  const computed: pl.Expr[] = [];
  keys.forEach((key, index) => {
    const column = keyColumn(key);
    if (column !== undefined) {
      names.push(column);
      return;
    }
    const name = `__${side}_key_${index}`;
    computed.push(evaluateChain(key).alias(name));
    names.push(name);
    added.push(name);
  });
  return { plan: computed.length === 0 ? plan : plan.withColumns(...computed), names, added };
}

function join(
  left: Plan,
  right: Plan,
  leftOn: readonly ExpressionChain[],
  rightOn: readonly ExpressionChain[],
  how: JoinHow,
): Plan {
  const l = joinKeys(left, leftOn, 'left');
  const r = joinKeys(right, rightOn, 'right');
  // the engine has no lazy right join: swap the sides of a left join
  const joined =
    how === 'right'
      ? r.plan.join(l.plan, { leftOn: r.names, rightOn: l.names, how: 'left' })
      : l.plan.join(r.plan, { leftOn: l.names, rightOn: r.names, how });
  const added = [...l.added, ...r.added];
  return added.length === 0 ? joined : joined.select(pl.exclude(added));
}

/** Applies one transform, returning the new plan. */
export function applyTransform(transform: TransformItem, plan: Plan, ctx: ResolveContext): Plan {
  switch (transform.type) {
    case 'select':
      return plan.select(...transform.columns.map(evaluateChain));
    case 'drop':
      return plan.drop([...transform.columns]);
    case 'rename': {
      if ('map' in transform) {
        return plan.rename({ ...transform.map });
      }
      const { prefix } = transform;
      return plan.rename(Object.fromEntries(plan.columns.map((column) => [column, `${prefix}${column}`])));
    }
    case 'filter': {
      const predicates = [
        ...(transform.condition !== undefined ? [evaluateCondition(transform.condition)] : []),
        ...transform.conditions.map(evaluateChain),
      ];
      const [first, ...rest] = predicates;
      if (first === undefined) {
        throw new EtlError('filter must have at least one condition');
      }
      return plan.filter(rest.reduce((acc, next) => acc.and(next), first));
    }
    case 'extract':
      return extract(plan, transform.column, transform.pattern, transform.filter);
    case 'unnest':
      return unnest(plan, transform.columns);
    case 'sort_by':
      return plan.sort(
        transform.by.map((key) => key.column),
        transform.by.map((key) => key.descending),
      );
    case 'drop_duplicates':
      return dropDuplicates(plan, transform.subset, transform.keep);
    case 'join':
      return join(
        plan,
        loadLoader(transform.right, ctx),
        transform.leftOn,
        transform.rightOn,
        transform.how,
      );
    case 'set':
      return plan.withColumn(evaluateChain(transform.expr));
    case 'with_columns':
      return plan.withColumns(...transform.columns.map(evaluateChain));
    case 'explode':
      return plan.explode([...transform.columns]);
    case 'collect':
      return plan.collectSync().lazy();
    case 'group_by':
      return plan.groupBy(transform.keys.map(evaluateChain), true).agg(...transform.aggregations.map(evaluateChain));
    case 'concat':
      return pl.concat([plan, loadLoader(transform.other, ctx)], { how: transform.how });
  }
}

/**
 * Folds the transforms over the plan in order. Engine failures are wrapped in
 * EngineError naming the transform and its 1-based position.
 */
export function foldTransforms(plan: Plan, transforms: readonly TransformItem[], ctx: ResolveContext): Plan {
  return transforms.reduce((acc, transform, index) => {
    const node = `${transform.type} transform #${index + 1}`;
    ctx.logger.debug({ transform: transform.type, position: index + 1 }, 'applying transform');
    try {
      return applyTransform(transform, acc, ctx);
    } catch (err) {
      if (err instanceof EtlError) throw err;
      throw new EngineError(node, err);
    }
  }, plan);
}
