import type { ActivityName, ActivityReport, BaseActivityRecord, ComputedMetrics } from '../types/activity.types'
import { M_IN_KM, type StrideConstants } from './activity-metrics.constants'

export interface MetricsCalculator {
  readonly activityName: ActivityName
  getDistance(): number
  getMeanSpeed(): number
  getSpentCalories(): number
  buildReport(): ActivityReport
}

/**
 * Shared distance and speed formulas for every workout variant.
 *
 * Distance is `action * stepLengthM / 1000` and mean speed is distance over
 * duration. Variants supply their own constants table and calorie formula, and
 * may override either default.
 */
export abstract class Training<TRecord extends BaseActivityRecord = BaseActivityRecord>
  implements MetricsCalculator
{
  abstract readonly activityName: ActivityName
  protected abstract readonly constants: StrideConstants

  readonly record: Readonly<TRecord>

  constructor(record: TRecord) {
    this.record = Object.freeze({ ...record })
  }

  get duration(): number {
    return this.record.duration
  }

  get weight(): number {
    return this.record.weight
  }

  getDistance(): number {
    return (this.record.action * this.constants.stepLengthM) / M_IN_KM
  }

  getMeanSpeed(): number {
    return this.getDistance() / this.record.duration
  }

  abstract getSpentCalories(): number

  getMetrics(): ComputedMetrics {
    return {
      distanceKm: this.getDistance(),
      meanSpeedKmh: this.getMeanSpeed(),
      calories: this.getSpentCalories(),
    }
  }

  buildReport(): ActivityReport {
    const { distanceKm, meanSpeedKmh, calories } = this.getMetrics()
    return Object.freeze({
      activityName: this.activityName,
      duration: this.record.duration,
      distance: distanceKm,
      speed: meanSpeedKmh,
      calories,
    })
  }
}
