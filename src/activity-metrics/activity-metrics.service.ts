import { Injectable, Logger } from '@nestjs/common'
import { validateSync, type ValidationError } from 'class-validator'
import type { ActivityPackage, ActivityReport } from '../types/activity.types'
import { formatReport } from './activity-report.presenter'
import {
  InvalidRecordError,
  isActivityMetricsError,
  type ActivityMetricsError,
} from './activity-metrics.errors'
import { ActivityPackageDto } from './dto/activity-package.dto'
import { readPackage, type Workout } from './read-package'

export type ActivityPackageResult =
  | { workoutType: string; ok: true; report: ActivityReport; message: string }
  | { workoutType: string; ok: false; error: ActivityMetricsError }

@Injectable()
export class ActivityMetricsService {
  private readonly logger = new Logger(ActivityMetricsService.name)

  select(workoutType: string, values: readonly number[]): Workout {
    const workout = readPackage(workoutType, values)
    this.logger.debug(`${workoutType} -> ${workout.activityName} (${values.length} values)`)
    return workout
  }

  buildReport(workout: Workout): ActivityReport {
    return workout.buildReport()
  }

  formatReport(report: ActivityReport): string {
    return formatReport(report)
  }

  describe(pkg: ActivityPackage): string {
    const dto = this.validatePackage(pkg)
    const workout = this.select(dto.workoutType, dto.data)
    return this.formatReport(this.buildReport(workout))
  }

  /**
   * Runs every package independently: a rejected package yields a failed result
   * and the rest are still processed. Errors other than unknown activity or
   * invalid record are rethrown.
   */
  processPackages(packages: readonly ActivityPackage[]): ActivityPackageResult[] {
    return packages.map((pkg): ActivityPackageResult => {
      try {
        const dto = this.validatePackage(pkg)
        const report = this.buildReport(this.select(dto.workoutType, dto.data))
        return { workoutType: dto.workoutType, ok: true, report, message: this.formatReport(report) }
      } catch (err) {
        if (!isActivityMetricsError(err)) throw err
        this.logger.warn(err.message)
        return { workoutType: String(pkg.workoutType), ok: false, error: err }
      }
    })
  }

  private validatePackage(pkg: ActivityPackage): ActivityPackageDto {
    const dto = Object.assign(new ActivityPackageDto(), pkg)
    const errors = validateSync(dto)
    if (errors.length > 0) {
      throw new InvalidRecordError(String(pkg.workoutType), this.collectConstraints(errors))
    }
    return dto
  }

  private collectConstraints(errors: ValidationError[]): string[] {
    return errors.flatMap((e) => Object.values(e.constraints ?? {}))
  }
}
