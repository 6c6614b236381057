import type { SwimmingRecord } from '../types/activity.types'
import { M_IN_KM, SWIMMING_CONSTANTS } from './activity-metrics.constants'
import { Training } from './training'

export class Swimming extends Training<SwimmingRecord> {
  readonly activityName = 'Swimming'
  protected readonly constants = SWIMMING_CONSTANTS

  /** Taken from pool laps, not from stroke count. */
  getMeanSpeed(): number {
    const { lengthPool, countPool, duration } = this.record
    return (lengthPool * countPool) / M_IN_KM / duration
  }

  getSpentCalories(): number {
    const { calorieSpeedShift, calorieWeightMultiplier } = this.constants
    return (this.getMeanSpeed() + calorieSpeedShift) * calorieWeightMultiplier * this.weight
  }
}
