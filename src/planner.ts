/**
 * Unpacking planner - walks a compiled schema and lists the explode/unnest
 * steps that flatten a nested frame, followed by the final rename and column
 * selection.
 *
 * Two renaming strategies are available:
 *
 * - `eager`: struct fields are unnested under their full json path
 *   (`json.foo`), so intermediate columns never collide whatever the order;
 * - `deferred`: fields keep their attribute names while unpacking and only
 *   leaves are renamed at the end. A struct whose fields would collide with an
 *   existing column falls back to full json path names.
 */

import { CompiledSchema, Field, LeafColumn, ScalarKind, SchemaType, StructType, UnpackPlan, UnpackStep } from './types';
import { PlanOptions, ResolvedPlanOptions, planOptionsSchema } from './options';
import { UnpackPlanningError } from './errors';

export class UnpackPlanner {
  private readonly schema: CompiledSchema;
  private readonly options: ResolvedPlanOptions;

  constructor(schema: CompiledSchema, options: PlanOptions = {}) {
    this.schema = schema;
    this.options = planOptionsSchema.parse(options);
  }

  plan(): UnpackPlan {
    const state: PlanState = {
      columns: this.schema.root.fields.map(field => field.name),
      steps: [],
      leaves: [],
    };

    for (const field of this.schema.root.fields) {
      this.visit(state, field.type, field.name, field.name);
    }

    const rename = new Map<string, string>();
    for (const leaf of state.leaves) {
      const renamedTo = this.schema.bindings.get(leaf.path);
      if (renamedTo === undefined) {
        throw new UnpackPlanningError(`No column bound to json path "${leaf.path}"`);
      }
      if (renamedTo !== leaf.column) {
        rename.set(leaf.column, renamedTo);
      }
    }

    return {
      strategy: this.options.strategy,
      root: this.schema.root,
      steps: state.steps,
      leaves: state.leaves,
      rename,
      select: [...this.schema.columns],
    };
  }

  private visit(state: PlanState, type: SchemaType, column: string, path: string): void {
    switch (type.kind) {
      case 'scalar':
        state.leaves.push({ column, path, dtype: type.dtype });
        break;
      case 'list':
        state.steps.push({ op: 'explode', column });
        this.visit(state, type.element, column, path);
        break;
      case 'struct':
        this.unnest(state, type, column, path);
        break;
    }
  }

  private unnest(state: PlanState, type: StructType, column: string, path: string): void {
    const fullPathPrefix = path ? `${path}${this.schema.separator}` : '';
    let prefix = this.options.strategy === 'eager' ? fullPathPrefix : '';
    const others = state.columns.filter(existing => existing !== column);

    if (this.collides(others, type, prefix)) {
      if (prefix === fullPathPrefix) {
        throw new UnpackPlanningError(`Unnesting "${column}" would produce duplicate columns`);
      }
      prefix = fullPathPrefix;
      if (this.collides(others, type, prefix)) {
        throw new UnpackPlanningError(`Unnesting "${column}" would produce duplicate columns`);
      }
    }

    const index = state.columns.indexOf(column);
    if (index === -1) {
      throw new UnpackPlanningError(`This should not happen: ${column} missing from planned columns`);
    }
    const fields = type.fields.map(field => field.name);
    state.columns.splice(index, 1, ...fields.map(name => `${prefix}${name}`));
    state.steps.push({ op: 'unnest', column, prefix, fields });

    for (const field of type.fields) {
      const fieldPath = [path, field.name].filter(segment => segment !== '').join(this.schema.separator);
      this.visit(state, field.type, `${prefix}${field.name}`, fieldPath);
    }
  }

  private collides(others: string[], type: StructType, prefix: string): boolean {
    return type.fields.some(field => others.includes(`${prefix}${field.name}`));
  }
}

interface PlanState {
  // simulated column set of the frame being unpacked
  columns: string[];
  steps: UnpackStep[];
  leaves: LeafColumn[];
}

export function planUnpack(schema: CompiledSchema, options?: PlanOptions): UnpackPlan {
  return new UnpackPlanner(schema, options).plan();
}

/** Leaves of the plan absent from the decomposed frame, to be added as typed nulls. */
export function missingColumns(plan: UnpackPlan, present: readonly string[]): Array<{ column: string; dtype: ScalarKind }> {
  return plan.leaves
    .filter(leaf => !present.includes(leaf.column))
    .map(({ column, dtype }) => ({ column, dtype }));
}

/**
 * Source columns the plan consumes, in schema order. Everything else in the
 * frame is dropped before decomposition so it cannot collide with unnested or
 * renamed columns. An anonymous root struct may arrive already spread into
 * columns, in which case its fields are taken instead.
 */
export function sourceColumns(plan: UnpackPlan, present: readonly string[]): string[] {
  return [...new Set(collectSources(plan.root.fields, present))];
}

function collectSources(fields: readonly Field[], present: readonly string[]): string[] {
  return fields.flatMap(field => {
    if (present.includes(field.name)) {
      return [field.name];
    }
    if (field.name === '' && field.type.kind === 'struct') {
      return collectSources(field.type.fields, present);
    }
    return [];
  });
}
