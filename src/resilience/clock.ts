import { setTimeout as delay } from 'node:timers/promises';

/** Milliseconds since the epoch. */
export type Clock = () => number;
export type Sleep = (ms: number) => Promise<void>;

export const systemClock: Clock = () => Date.now();

export const sleep: Sleep = async ms => {
  await delay(ms);
};
