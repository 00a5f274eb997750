#!/usr/bin/env node
import { createDialogueEngine } from '../engine';
import { logger } from '../shared/logger';
import { formatDebugList, formatTranscriptLine } from '../shared/messages';

const args = process.argv.slice(2);

function readOption(name: string): string | undefined {
  const index = args.indexOf(name);
  return index !== -1 ? args[index + 1] : undefined;
}

const seed = readOption('--seed') ?? 'offline-session';
const count = Number.parseInt(readOption('--count') ?? '40', 10);
const crisis = args.includes('--crisis');
const debug = args.includes('--debug');

if (!Number.isFinite(count) || count <= 0) {
  logger.error('[run-session] --count must be a positive integer');
  process.exit(1);
}

// Simulated clock: the loop advances time by the director's own delay, so a
// long transcript renders instantly.
const origin = Date.UTC(2024, 0, 1);
let now = origin;

const { director } = createDialogueEngine({
  clock: () => now,
  settings: { seed, developerMode: debug }
});

if (crisis) {
  director.notifyCrisisMode(true, now);
}

const TICK_FLOOR_MS = 250;
const MAX_TICKS = count * 50;
let produced = 0;

for (let tick = 0; tick < MAX_TICKS && produced < count; tick += 1) {
  const message = director.produceNextMessage(now);
  if (message) {
    produced += 1;
    process.stdout.write(`${formatTranscriptLine(message, origin)}\n`);
  }
  now += Math.max(TICK_FLOOR_MS, director.getNextDelayMs(now));
}

if (debug) {
  process.stdout.write(`\n${formatDebugList(director.getDebugLines(now))}\n`);
}
