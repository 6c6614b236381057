import type { ActivityReport } from '../types/activity.types'

const DECIMALS = 3

function fixed(value: number): string {
  return value.toFixed(DECIMALS)
}

export function formatReport(report: ActivityReport): string {
  return (
    `Activity type: ${report.activityName}; ` +
    `Duration: ${fixed(report.duration)} h.; ` +
    `Distance: ${fixed(report.distance)} km; ` +
    `Avg. speed: ${fixed(report.speed)} km/h; ` +
    `Calories burned: ${fixed(report.calories)}.`
  )
}
