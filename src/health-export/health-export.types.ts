export type Quantity = {
  qty: number
  units?: string
}

export type HeartRateSample = {
  date?: string
  Avg?: number | null
  Min?: number | null
  Max?: number | null
  units?: string
  source?: string
}

export type QuantitySample = {
  date?: string
  qty?: number | null
  units?: string
  source?: string
}

export type HeartRateSummary = {
  min?: Quantity
  avg?: Quantity
  max?: Quantity
}

/**
 * One workout record of a Health Auto Export document. Only the identity
 * fields are required; every quantity and series may be absent.
 * Unknown fields are carried through unchanged.
 */
export type Workout = {
  id: string
  name: string
  start: string
  end: string
  /** seconds */
  duration: number
  avgHeartRate?: Quantity
  maxHeartRate?: Quantity
  heartRate?: HeartRateSummary
  /** kJ */
  activeEnergyBurned?: Quantity
  /** km */
  distance?: Quantity
  speed?: Quantity
  /** steps per minute */
  stepCadence?: Quantity
  heartRateData?: HeartRateSample[]
  heartRateRecovery?: HeartRateSample[]
  stepCount?: QuantitySample[]
  /** per-minute kJ */
  activeEnergy?: QuantitySample[]
  [field: string]: unknown
}

export type ExportReadResult =
  | { status: 'ok'; files: string[]; entries: unknown[] }
  | { status: 'missing'; date: string; exportDir: string }
  | { status: 'unreadable'; filePath: string; reason: string }
