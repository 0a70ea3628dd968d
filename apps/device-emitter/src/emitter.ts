import 'dotenv/config';
import { fetch } from 'undici';
import { z } from 'zod';
import { SeededRng } from '@field-visit/adapters';
import { haversineDistance, type Coordinate } from '@field-visit/domain';
import { bearing, jitter, stepToward } from './walker.js';

/**
 * Worker device simulator: one process per visit.
 *
 * Env vars:
 *   VISIT_ID            visit to track (required)
 *   API_BASE_URL        Base URL of the field-visit API (default: http://api:3001)
 *   EMIT_INTERVAL_MS    Fix interval in ms (default: 5000)
 *   START_LAT           Starting latitude (required)
 *   START_LNG           Starting longitude (required)
 *   WALK_SPEED_MPS      Walking speed (default: 1.4)
 *   POOR_FIX_RATE       Share of fixes reported with poor accuracy (default: 0.1)
 *   DWELL_MS            Time on site before stopping the visit (default: 600000)
 *   SEED                RNG seed for repeatable runs (default: 42)
 */

const EnvSchema = z.object({
  VISIT_ID: z.string().min(1),
  API_BASE_URL: z.string().url().default('http://api:3001'),
  EMIT_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
  START_LAT: z.coerce.number().min(-90).max(90),
  START_LNG: z.coerce.number().min(-180).max(180),
  WALK_SPEED_MPS: z.coerce.number().positive().default(1.4),
  POOR_FIX_RATE: z.coerce.number().min(0).max(1).default(0.1),
  DWELL_MS: z.coerce.number().int().nonnegative().default(10 * 60 * 1000),
  SEED: z.coerce.number().int().default(42),
});

const VisitSchema = z.object({
  id: z.string(),
  status: z.enum(['scheduled', 'active', 'completed', 'cancelled']),
  destination: z.object({ latitude: z.number(), longitude: z.number() }).nullable(),
});

const parsedEnv = EnvSchema.safeParse(process.env);
if (!parsedEnv.success) {
  console.error('[emitter] invalid environment', parsedEnv.error.flatten().fieldErrors);
  process.exit(1);
}
const env = parsedEnv.data;
const tag = `[emitter:${env.VISIT_ID}]`;
const rng = new SeededRng(env.SEED);

let position: Coordinate = { latitude: env.START_LAT, longitude: env.START_LNG };
let arrivedAt: number | null = null;
let busy = false;

async function call(path: string, body?: unknown): Promise<unknown> {
  const resp = await fetch(`${env.API_BASE_URL}${path}`, {
    method: body === undefined ? 'GET' : 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  if (!resp.ok) {
    throw new Error(`${path} failed ${resp.status}: ${await resp.text()}`);
  }
  return resp.json();
}

async function beginTracking(): Promise<Coordinate> {
  const visit = VisitSchema.parse(await call(`/api/visits/${env.VISIT_ID}/track`, {}));
  if (!visit.destination) throw new Error('visit has no destination after /track');
  console.log(`${tag} tracking started, destination ${visit.destination.latitude},${visit.destination.longitude}`);
  return visit.destination;
}

async function tick(target: Coordinate): Promise<boolean> {
  const heading = bearing(position, target);
  position = stepToward(position, target, env.WALK_SPEED_MPS * (env.EMIT_INTERVAL_MS / 1000));
  const poor = rng.chance(env.POOR_FIX_RATE);
  const reported = jitter(position, rng, poor ? 40 : 4);
  const fix = {
    ...reported,
    altitude: 0,
    horizontalAccuracy: poor ? rng.between(60, 120) : rng.between(3, 15),
    speed: arrivedAt === null ? env.WALK_SPEED_MPS : 0,
    course: arrivedAt === null ? heading : -1,
    timestamp: new Date().toISOString(),
  };
  await call(`/api/ingest/visits/${env.VISIT_ID}/fixes`, { fixes: [fix] });

  const remaining = haversineDistance(position, target);
  if (arrivedAt === null && remaining < 1) {
    arrivedAt = Date.now();
    console.log(`${tag} arrived on site`);
  }
  if (arrivedAt === null || Date.now() - arrivedAt < env.DWELL_MS) return false;

  const visit = VisitSchema.parse(await call(`/api/visits/${env.VISIT_ID}`));
  if (visit.status === 'active') {
    await call(`/api/visits/${env.VISIT_ID}/stop`, {});
    console.log(`${tag} visit stopped after dwell`);
  }
  return true;
}

async function main(): Promise<void> {
  const target = await beginTracking();
  const timer = setInterval(() => {
    if (busy) return;
    busy = true;
    tick(target)
      .then((done) => {
        if (done) {
          clearInterval(timer);
          console.log(`${tag} finished`);
        }
      })
      .catch((err: unknown) => {
        console.error(`${tag} tick failed`, err instanceof Error ? err.message : err);
      })
      .finally(() => {
        busy = false;
      });
  }, env.EMIT_INTERVAL_MS);
}

console.log(`${tag} starting at ${env.START_LAT},${env.START_LNG}`);
main().catch((err) => {
  console.error(`${tag} fatal`, err);
  process.exit(1);
});
