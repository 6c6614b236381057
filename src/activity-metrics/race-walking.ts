import type { RaceWalkingRecord } from '../types/activity.types'
import { MIN_IN_H, RACE_WALKING_CONSTANTS } from './activity-metrics.constants'
import { Training } from './training'

export class RaceWalking extends Training<RaceWalkingRecord> {
  readonly activityName = 'RaceWalking'
  protected readonly constants = RACE_WALKING_CONSTANTS

  get height(): number {
    return this.record.height
  }

  getSpentCalories(): number {
    const { calorieWeightMultiplier, calorieSpeedHeightMultiplier } = this.constants
    // speed² over height is floored, not divided
    const speedHeightRatio = Math.floor(this.getMeanSpeed() ** 2 / this.height)
    return (
      (calorieWeightMultiplier * this.weight +
        speedHeightRatio * calorieSpeedHeightMultiplier * this.weight) *
      this.duration *
      MIN_IN_H
    )
  }
}
