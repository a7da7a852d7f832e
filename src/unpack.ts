/**
 * Plan execution - applies an unpacking plan through a tabular engine.
 *
 * Fields described in the schema but absent from the source come out as typed
 * null columns; fields present in the source but absent from the schema are
 * dropped before any step runs.
 */

import { JsonValue, TabularEngine, UnpackPlan } from './types';
import { UnpackOptions, unpackOptionsSchema } from './options';
import { compile } from './parser';
import { missingColumns, planUnpack, sourceColumns } from './planner';
import { RecordFrame, recordEngine } from './frame';

export function unpackFrame<F>(engine: TabularEngine<F>, frame: F, plan: UnpackPlan): F {
  let current = engine.select(frame, sourceColumns(plan, engine.columns(frame)));

  for (const step of plan.steps) {
    // nothing to decompose when the source lacks the column
    if (!engine.columns(current).includes(step.column)) {
      continue;
    }
    current = step.op === 'explode'
      ? engine.explode(current, step.column)
      : engine.unnest(current, step.column, step.prefix, step.fields);
  }

  for (const { column, dtype } of missingColumns(plan, engine.columns(current))) {
    current = engine.withNullColumn(current, column, dtype);
  }

  return engine.select(engine.rename(current, plan.rename), plan.select);
}

export function unpackRecords(
  source: string,
  records: readonly JsonValue[],
  options: UnpackOptions = {}
): Array<Record<string, JsonValue>> {
  return unpackRecordFrame(source, RecordFrame.fromRecords(records), options).toRecords();
}

export function unpackNdjson(source: string, content: string, options: UnpackOptions = {}): Array<Record<string, JsonValue>> {
  return unpackRecordFrame(source, RecordFrame.fromNdjson(content), options).toRecords();
}

function unpackRecordFrame(source: string, frame: RecordFrame, options: UnpackOptions): RecordFrame {
  const { separator, sourceName, strategy } = unpackOptionsSchema.parse(options);
  const schema = compile(source, { separator, sourceName });
  const plan = planUnpack(schema, { strategy });
  return unpackFrame(recordEngine, frame, plan);
}
