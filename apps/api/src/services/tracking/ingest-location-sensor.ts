import type { FixListener, LocationPoint, LocationSensorPort, SamplingProfile } from '@field-visit/domain';

/**
 * Sensor fed by fixes the device uploads. The active profile is only advisory here;
 * the device learns it through the `samplingMode` stream message.
 */
export class IngestLocationSensor implements LocationSensorPort {
  private readonly listeners = new Set<FixListener>();
  private running = false;
  private currentProfile: SamplingProfile | null = null;

  get isRunning(): boolean {
    return this.running;
  }

  get profile(): SamplingProfile | null {
    return this.currentProfile;
  }

  start(profile: SamplingProfile): void {
    this.running = true;
    this.currentProfile = profile;
  }

  reconfigure(profile: SamplingProfile): void {
    this.currentProfile = profile;
  }

  stop(): void {
    this.running = false;
  }

  onFix(listener: FixListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Returns false when the sensor is stopped and the fix was discarded. */
  push(fix: LocationPoint): boolean {
    if (!this.running) return false;
    for (const listener of [...this.listeners]) listener(fix);
    return true;
  }
}
