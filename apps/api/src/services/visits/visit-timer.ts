import type { VisitRecord, VisitTimerView } from '@field-visit/domain';

const FIVE_MINUTES_S = 300;

const pad = (n: number): string => String(n).padStart(2, '0');

/** `MM:SS`; minutes are not wrapped into hours. */
export function formatCountdown(totalSeconds: number): string {
  const s = Math.abs(Math.trunc(totalSeconds));
  return `${pad(Math.floor(s / 60))}:${pad(s % 60)}`;
}

/** `MM:SS`, or `H:MM:SS` from one hour up. */
export function formatElapsed(totalSeconds: number): string {
  const s = Math.max(0, Math.trunc(totalSeconds));
  const hours = Math.floor(s / 3600);
  const minutes = Math.floor((s % 3600) / 60);
  const seconds = s % 60;
  return hours > 0 ? `${hours}:${pad(minutes)}:${pad(seconds)}` : `${pad(minutes)}:${pad(seconds)}`;
}

export function startDeviation(visit: VisitRecord): string | null {
  if (!visit.actualStart) return null;
  const minutes = Math.trunc((visit.actualStart.getTime() - visit.scheduledStart.getTime()) / 60_000);
  if (minutes === 0) return null;
  return minutes < 0 ? `${-minutes}m early` : `${minutes}m late`;
}

const seconds = (fromMs: number, toMs: number): number => Math.floor((toMs - fromMs) / 1000);

export function computeVisitTimer(visit: VisitRecord, now: Date): VisitTimerView {
  const nowMs = now.getTime();
  let elapsedSeconds = 0;
  let remainingSeconds = 0;

  switch (visit.status) {
    case 'scheduled':
      remainingSeconds = seconds(visit.scheduledStart.getTime(), visit.scheduledEnd.getTime());
      break;
    case 'active':
      elapsedSeconds = visit.actualStart ? seconds(visit.actualStart.getTime(), nowMs) : 0;
      remainingSeconds = seconds(nowMs, visit.scheduledEnd.getTime());
      break;
    case 'completed':
      if (visit.actualStart && visit.actualEnd) {
        elapsedSeconds = seconds(visit.actualStart.getTime(), visit.actualEnd.getTime());
      }
      break;
    case 'cancelled':
      if (visit.actualStart && visit.cancelledAt) {
        elapsedSeconds = seconds(visit.actualStart.getTime(), visit.cancelledAt.getTime());
      }
      break;
  }

  const isOvertime = visit.status === 'active' && remainingSeconds < 0;
  return {
    visitId: visit.id,
    status: visit.status,
    now,
    elapsedSeconds,
    remainingSeconds,
    isOvertime,
    isFiveMinuteWarning: visit.status === 'active' && remainingSeconds > 0 && remainingSeconds <= FIVE_MINUTES_S,
    elapsedLabel: formatElapsed(elapsedSeconds),
    remainingLabel: `${isOvertime ? '+' : ''}${formatCountdown(remainingSeconds)}`,
    startDeviation: startDeviation(visit),
  };
}
