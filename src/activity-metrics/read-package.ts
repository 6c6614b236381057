import type { z } from 'zod'
import type {
  ActivityCode,
  BaseActivityRecord,
  RaceWalkingRecord,
  RunningRecord,
  SwimmingRecord,
} from '../types/activity.types'
import { InvalidRecordError, UnknownActivityError } from './activity-metrics.errors'
import {
  formatSchemaIssues,
  raceWalkingRecordSchema,
  runningRecordSchema,
  swimmingRecordSchema,
} from './activity-record.schema'
import { RaceWalking } from './race-walking'
import { Running } from './running'
import { Swimming } from './swimming'

export type Workout = Running | RaceWalking | Swimming

type TrainingFactory<TRecord extends BaseActivityRecord> = {
  fields: readonly (keyof TRecord & string)[]
  schema: z.ZodType<TRecord>
  create: (record: TRecord) => Workout
}

function factory<TRecord extends BaseActivityRecord>(
  def: TrainingFactory<TRecord>,
): (code: ActivityCode, values: readonly number[]) => Workout {
  return (code, values) => {
    if (values.length !== def.fields.length) {
      throw new InvalidRecordError(code, [
        `expected ${def.fields.length} values (${def.fields.join(', ')}), got ${values.length}`,
      ])
    }

    const raw: Record<string, number> = {}
    def.fields.forEach((field, i) => {
      raw[field] = values[i]
    })

    const parsed = def.schema.safeParse(raw)
    if (!parsed.success) {
      throw new InvalidRecordError(code, formatSchemaIssues(parsed.error))
    }
    return def.create(parsed.data)
  }
}

export const ACTIVITY_FIELDS = {
  SWM: ['action', 'duration', 'weight', 'lengthPool', 'countPool'],
  RUN: ['action', 'duration', 'weight'],
  WLK: ['action', 'duration', 'weight', 'height'],
} as const satisfies Record<ActivityCode, readonly string[]>

const TRAINING_FACTORIES: Record<ActivityCode, (code: ActivityCode, values: readonly number[]) => Workout> = {
  SWM: factory<SwimmingRecord>({
    fields: ACTIVITY_FIELDS.SWM,
    schema: swimmingRecordSchema,
    create: (record) => new Swimming(record),
  }),
  RUN: factory<RunningRecord>({
    fields: ACTIVITY_FIELDS.RUN,
    schema: runningRecordSchema,
    create: (record) => new Running(record),
  }),
  WLK: factory<RaceWalkingRecord>({
    fields: ACTIVITY_FIELDS.WLK,
    schema: raceWalkingRecordSchema,
    create: (record) => new RaceWalking(record),
  }),
}

export function isActivityCode(code: string): code is ActivityCode {
  return Object.prototype.hasOwnProperty.call(TRAINING_FACTORIES, code)
}

/**
 * Binds raw sensor values to the workout variant named by `workoutType`.
 * Values are positional: action, duration, weight, then the variant's own fields.
 */
export function readPackage(workoutType: string, values: readonly number[]): Workout {
  if (!isActivityCode(workoutType)) {
    throw new UnknownActivityError(workoutType)
  }
  return TRAINING_FACTORIES[workoutType](workoutType, values)
}
