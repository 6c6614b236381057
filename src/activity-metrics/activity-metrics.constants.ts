export const M_IN_KM = 1000
export const MIN_IN_H = 60

export interface StrideConstants {
  /** Meters covered per unit of `action` */
  stepLengthM: number
}

export const RUNNING_CONSTANTS = Object.freeze({
  stepLengthM: 0.65,
  calorieSpeedMultiplier: 18,
  calorieSpeedShift: 20,
} satisfies StrideConstants & Record<string, number>)

export const RACE_WALKING_CONSTANTS = Object.freeze({
  stepLengthM: 0.65,
  calorieWeightMultiplier: 0.035,
  calorieSpeedHeightMultiplier: 0.029,
} satisfies StrideConstants & Record<string, number>)

export const SWIMMING_CONSTANTS = Object.freeze({
  stepLengthM: 1.38,
  calorieSpeedShift: 1.1,
  calorieWeightMultiplier: 2,
} satisfies StrideConstants & Record<string, number>)
