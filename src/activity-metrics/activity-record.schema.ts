import { z } from 'zod'

const baseRecordSchema = z.object({
  action: z.number().finite().int().nonnegative(),
  duration: z.number().finite().positive(),
  weight: z.number().finite().positive(),
})

export const runningRecordSchema = baseRecordSchema

export const raceWalkingRecordSchema = baseRecordSchema.extend({
  height: z.number().finite().positive(),
})

export const swimmingRecordSchema = baseRecordSchema.extend({
  lengthPool: z.number().finite().int().positive(),
  countPool: z.number().finite().int().nonnegative(),
})

export function formatSchemaIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}
