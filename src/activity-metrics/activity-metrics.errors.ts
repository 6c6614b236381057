import { BadRequestException } from '@nestjs/common'

export class UnknownActivityError extends BadRequestException {
  constructor(readonly activityCode: string) {
    super(`Unknown activity type: ${activityCode}`)
    this.name = 'UnknownActivityError'
  }
}

export class InvalidRecordError extends BadRequestException {
  constructor(
    readonly activityCode: string,
    readonly issues: string[],
  ) {
    super(`Invalid ${activityCode} record: ${issues.join('; ')}`)
    this.name = 'InvalidRecordError'
  }
}

export type ActivityMetricsError = UnknownActivityError | InvalidRecordError

export function isActivityMetricsError(err: unknown): err is ActivityMetricsError {
  return err instanceof UnknownActivityError || err instanceof InvalidRecordError
}
