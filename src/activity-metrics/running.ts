import type { RunningRecord } from '../types/activity.types'
import { M_IN_KM, MIN_IN_H, RUNNING_CONSTANTS } from './activity-metrics.constants'
import { Training } from './training'

export class Running extends Training<RunningRecord> {
  readonly activityName = 'Running'
  protected readonly constants = RUNNING_CONSTANTS

  getSpentCalories(): number {
    const { calorieSpeedMultiplier, calorieSpeedShift } = this.constants
    const speedFactor = calorieSpeedMultiplier * this.getMeanSpeed() - calorieSpeedShift
    return ((speedFactor * this.weight) / M_IN_KM) * this.duration * MIN_IN_H
  }
}
