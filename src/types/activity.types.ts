export type ActivityCode = 'SWM' | 'RUN' | 'WLK'

export type ActivityName = 'Running' | 'RaceWalking' | 'Swimming'

export interface BaseActivityRecord {
  /** Steps or strokes counted by the sensor */
  action: number
  /** Hours */
  duration: number
  /** Kilograms */
  weight: number
}

export type RunningRecord = BaseActivityRecord

export interface RaceWalkingRecord extends BaseActivityRecord {
  /** Centimeters */
  height: number
}

export interface SwimmingRecord extends BaseActivityRecord {
  /** Pool length in meters */
  lengthPool: number
  /** Number of pool lengths swum */
  countPool: number
}

export interface ComputedMetrics {
  distanceKm: number
  meanSpeedKmh: number
  calories: number
}

export type ActivityReport = Readonly<{
  activityName: ActivityName
  duration: number
  distance: number
  speed: number
  calories: number
}>

export interface ActivityPackage {
  workoutType: string
  data: number[]
}
