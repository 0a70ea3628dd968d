import type {
  FixListener,
  LocationPoint,
  LocationSensorPort,
  SamplingMode,
  SamplingProfile,
  TrackingConfig,
} from '@field-visit/domain';

export type FixRejectionReason = 'low_accuracy';

export interface SamplerStats {
  accepted: number;
  rejected: number;
  lastRejection: FixRejectionReason | null;
}

export type SamplingModeListener = (profile: SamplingProfile) => void;

type SamplerConfig = Pick<
  TrackingConfig,
  'maxHorizontalAccuracyMeters' | 'routeIntervalMs' | 'samplingProfiles'
>;

/**
 * Filters raw sensor fixes by horizontal accuracy and fans valid ones out to subscribers.
 * While route sampling is on, a second stream carries at most one fix per `routeIntervalMs` of fix time.
 */
export class LocationSampler {
  private readonly fixListeners = new Set<FixListener>();
  private readonly routeListeners = new Set<FixListener>();
  private readonly modeListeners = new Set<SamplingModeListener>();
  private unsubscribeSensor: (() => void) | null = null;
  private currentMode: SamplingMode = 'battery_efficient';
  private routeSampling = false;
  private lastRouteFixAt: number | null = null;
  private readonly counters: SamplerStats = { accepted: 0, rejected: 0, lastRejection: null };

  constructor(
    private readonly sensor: LocationSensorPort,
    private readonly config: SamplerConfig,
  ) {}

  get mode(): SamplingMode {
    return this.currentMode;
  }

  get isRunning(): boolean {
    return this.unsubscribeSensor !== null;
  }

  get isRouteSampling(): boolean {
    return this.routeSampling;
  }

  get stats(): Readonly<SamplerStats> {
    return { ...this.counters };
  }

  start(mode: SamplingMode = this.currentMode): void {
    if (this.unsubscribeSensor) return;
    this.currentMode = mode;
    this.unsubscribeSensor = this.sensor.onFix((fix) => this.handleFix(fix));
    this.sensor.start(this.config.samplingProfiles[mode]);
    this.emitMode();
  }

  /** Halts delivery before returning. */
  stop(): void {
    this.routeSampling = false;
    if (!this.unsubscribeSensor) return;
    this.unsubscribeSensor();
    this.unsubscribeSensor = null;
    this.sensor.stop();
  }

  setMode(mode: SamplingMode): void {
    if (mode === this.currentMode) return;
    this.currentMode = mode;
    if (!this.unsubscribeSensor) return;
    this.sensor.reconfigure(this.config.samplingProfiles[mode]);
    this.emitMode();
  }

  enableRouteSampling(): void {
    this.routeSampling = true;
  }

  disableRouteSampling(): void {
    this.routeSampling = false;
  }

  onFix(listener: FixListener): () => void {
    this.fixListeners.add(listener);
    return () => {
      this.fixListeners.delete(listener);
    };
  }

  onRouteFix(listener: FixListener): () => void {
    this.routeListeners.add(listener);
    return () => {
      this.routeListeners.delete(listener);
    };
  }

  onModeChange(listener: SamplingModeListener): () => void {
    this.modeListeners.add(listener);
    return () => {
      this.modeListeners.delete(listener);
    };
  }

  isAccurate(fix: LocationPoint): boolean {
    return fix.horizontalAccuracy >= 0 && fix.horizontalAccuracy <= this.config.maxHorizontalAccuracyMeters;
  }

  private handleFix(fix: LocationPoint): void {
    if (!this.isAccurate(fix)) {
      this.counters.rejected++;
      this.counters.lastRejection = 'low_accuracy';
      return;
    }
    this.counters.accepted++;
    for (const listener of [...this.fixListeners]) listener(fix);

    if (!this.routeSampling) return;
    const at = fix.timestamp.getTime();
    if (this.lastRouteFixAt !== null && at - this.lastRouteFixAt < this.config.routeIntervalMs) return;
    this.lastRouteFixAt = at;
    for (const listener of [...this.routeListeners]) listener(fix);
  }

  private emitMode(): void {
    const profile = this.config.samplingProfiles[this.currentMode];
    for (const listener of [...this.modeListeners]) listener(profile);
  }
}
