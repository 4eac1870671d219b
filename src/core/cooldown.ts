import type { DelayRange } from "./config";
import { sleep } from "./retry";

export async function applyCooldown(baseSeconds: number): Promise<void> {
  if (baseSeconds <= 0) return;

  const jitter = Math.random() * baseSeconds * 0.5;
  const totalSeconds = baseSeconds + jitter;
  const totalMs = totalSeconds * 1000;

  await sleep(totalMs);
}

export async function actionDelay(range: DelayRange): Promise<void> {
  const { minMs, maxMs } = range;
  if (maxMs <= 0) return;

  const delay = minMs + Math.random() * (maxMs - minMs);

  await sleep(delay);
}
