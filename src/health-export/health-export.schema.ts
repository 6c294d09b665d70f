import { z } from 'zod'

const quantitySchema = z
  .object({
    qty: z.number(),
    units: z.string().optional(),
  })
  .passthrough()

const heartRateSampleSchema = z
  .object({
    date: z.string().optional(),
    Avg: z.number().nullish(),
    Min: z.number().nullish(),
    Max: z.number().nullish(),
    units: z.string().optional(),
    source: z.string().optional(),
  })
  .passthrough()

const quantitySampleSchema = z
  .object({
    date: z.string().optional(),
    qty: z.number().nullish(),
    units: z.string().optional(),
    source: z.string().optional(),
  })
  .passthrough()

export const workoutSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    start: z.string(),
    end: z.string(),
    duration: z.number().finite(),
    avgHeartRate: quantitySchema.optional(),
    maxHeartRate: quantitySchema.optional(),
    heartRate: z
      .object({
        min: quantitySchema.optional(),
        avg: quantitySchema.optional(),
        max: quantitySchema.optional(),
      })
      .passthrough()
      .optional(),
    activeEnergyBurned: quantitySchema.optional(),
    distance: quantitySchema.optional(),
    speed: quantitySchema.optional(),
    stepCadence: quantitySchema.optional(),
    heartRateData: z.array(heartRateSampleSchema).optional(),
    heartRateRecovery: z.array(heartRateSampleSchema).optional(),
    stepCount: z.array(quantitySampleSchema).optional(),
    activeEnergy: z.array(quantitySampleSchema).optional(),
  })
  .passthrough()

export const exportDocumentSchema = z
  .object({
    data: z
      .object({
        workouts: z.array(z.unknown()).default([]),
      })
      .passthrough(),
  })
  .passthrough()
