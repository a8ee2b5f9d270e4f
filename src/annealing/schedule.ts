import { ConfigError } from "../common/errors.js";

export interface CoolingSchedule {
  /** Starting temperature. */
  t0: number;
  /** Multiplicative cooling factor, strictly between 0 and 1. */
  alpha: number;
  /** The run terminates once the temperature drops below this. */
  temperatureMin: number;
  /** Proposals evaluated at each temperature before cooling. */
  iterationsPerTemperature: number;
}

export const DEFAULT_SCHEDULE: CoolingSchedule = {
  t0: 1.0,
  alpha: 0.9,
  temperatureMin: 0.00001,
  iterationsPerTemperature: 500
};

export function validateSchedule(schedule: CoolingSchedule): CoolingSchedule {
  const { t0, alpha, temperatureMin, iterationsPerTemperature } = schedule;
  if (!Number.isFinite(t0) || t0 <= 0) throw new ConfigError("t0 must be a positive number", { t0 });
  if (!(alpha > 0 && alpha < 1)) throw new ConfigError("alpha must lie strictly between 0 and 1", { alpha });
  if (!Number.isFinite(temperatureMin) || temperatureMin <= 0) {
    throw new ConfigError("temperatureMin must be a positive number", { temperatureMin });
  }
  if (!Number.isInteger(iterationsPerTemperature) || iterationsPerTemperature < 1) {
    throw new ConfigError("iterationsPerTemperature must be a positive integer", { iterationsPerTemperature });
  }
  return schedule;
}

export function cool(temperature: number, schedule: Pick<CoolingSchedule, "alpha">): number {
  return temperature * schedule.alpha;
}

/** Every temperature the loop visits, in order. */
export function* temperatures(schedule: CoolingSchedule): Generator<number> {
  validateSchedule(schedule);
  let t = schedule.t0;
  while (t >= schedule.temperatureMin) {
    yield t;
    t = cool(t, schedule);
  }
}

/** Number of distinct temperatures, i.e. outer iterations, before termination. */
export function temperatureStepCount(schedule: CoolingSchedule): number {
  let count = 0;
  for (const _ of temperatures(schedule)) count += 1;
  return count;
}
