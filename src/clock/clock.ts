/** Source of report timestamps; analysis results never depend on it. */
export interface Clock {
  /** current instant as an ISO 8601 UTC string */
  nowIso(): string
}

export const CLOCK = Symbol('CLOCK')

export class SystemClock implements Clock {
  nowIso(): string {
    return new Date().toISOString()
  }
}

/** Reports the same instant on every call, e.g. when replaying a stored batch. */
export class FixedClock implements Clock {
  private readonly iso: string

  constructor(instant: Date | string) {
    this.iso = new Date(instant).toISOString()
  }

  nowIso(): string {
    return this.iso
  }
}
