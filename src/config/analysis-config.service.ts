import { Logger } from '@nestjs/common'
import { heartRateZonesFromMax, powerZonesFromFtp } from '../zones/zone-presets'
import type { ZoneConfig } from '../zones/zones.types'
import { configInputFromEnv, DEFAULT_ANALYSIS_CONFIG, resolveAnalysisConfig } from './analysis-config'
import type { AnalysisConfig, AnalysisConfigInput } from './analysis-config.schema'

type Env = Record<string, string | undefined>

/** Process-wide analysis defaults, read once from the environment. */
export class AnalysisConfigService {
  private readonly logger = new Logger(AnalysisConfigService.name)
  private readonly config: AnalysisConfig
  private readonly zones: ZoneConfig

  constructor(env: Env) {
    this.config = resolveAnalysisConfig(DEFAULT_ANALYSIS_CONFIG, configInputFromEnv(env))

    const { maxHeartRate, ftpWatts } = this.config.athlete
    this.zones = Object.freeze({
      ...(maxHeartRate !== null ? { heartRate: heartRateZonesFromMax(maxHeartRate) } : {}),
      ...(ftpWatts !== null ? { power: powerZonesFromFtp(ftpWatts) } : {}),
    })

    if (maxHeartRate === null && ftpWatts === null) {
      this.logger.warn('Neither ATHLETE_MAX_HR nor ATHLETE_FTP_W is set; requests must bring their own zones')
    }
  }

  get(): AnalysisConfig {
    return this.config
  }

  /** Defaults with per-request overrides applied and validated. */
  resolve(overrides?: AnalysisConfigInput): AnalysisConfig {
    return overrides ? resolveAnalysisConfig(this.config, overrides) : this.config
  }

  defaultZones(): ZoneConfig {
    return this.zones
  }
}
