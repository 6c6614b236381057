import { IsArray, IsNotEmpty, IsNumber, IsString } from 'class-validator'
import type { ActivityPackage } from '../../types/activity.types'

export class ActivityPackageDto implements ActivityPackage {
  @IsString()
  @IsNotEmpty()
  workoutType!: string

  @IsArray()
  @IsNumber({ allowNaN: false, allowInfinity: false }, { each: true })
  data!: number[]
}
