import { z } from 'zod'

export const OBJECT_CATEGORIES = ['human', 'vehicle', 'wildlife', 'structure', 'sign'] as const

/** Which bounding-box dimension the known size describes. */
export const MEASUREMENT_AXES = ['height', 'shoulder-height', 'width', 'diagonal'] as const

export const knownObjectSizeSchema = z.object({
  label: z.string().min(1).max(100),
  displayName: z.string().min(1).max(200),
  category: z.enum(OBJECT_CATEGORIES),
  axis: z.enum(MEASUREMENT_AXES),
  sizeMeters: z.number().positive().max(1000),
  /** Relative spread of the real size across instances, 0–1. */
  variability: z.number().min(0).max(1),
  /** How far this object class is trusted in fusion, 0–1. */
  reliability: z.number().min(0).max(1),
  /** Expected bounding-box width / height. */
  aspectRatio: z.number().positive(),
  aliases: z.array(z.string().min(1)).optional(),
})

export const objectSizeCatalogSchema = z.object({
  version: z.number().int().min(1),
  objects: z.array(knownObjectSizeSchema).min(1),
})

export type ObjectCategory = (typeof OBJECT_CATEGORIES)[number]
export type MeasurementAxis = (typeof MEASUREMENT_AXES)[number]
export type KnownObjectSize = z.infer<typeof knownObjectSizeSchema>
export type ObjectSizeCatalog = z.infer<typeof objectSizeCatalogSchema>
