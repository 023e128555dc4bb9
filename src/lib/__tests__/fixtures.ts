/**
 * Shared test data. Medians are the middle of three finishes per venue/gender.
 */

import type { EngineConfig, Gender, ResultRecord } from "../../types.js";
import { DEFAULT_ENGINE_CONFIG } from "../config.js";

/** Default bounds without top-fraction trimming, so medians are easy to read off. */
export const NO_TRIM: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, fullSampleThreshold: 0 };

export function rec(venue: string, gender: Gender, ...times: number[]): ResultRecord[] {
  return times.map((finishSeconds) => ({ venue, gender, finishSeconds }));
}

/**
 * Men's medians: London 4046, Dublin 4495, Maastricht 4800, Utrecht 4905, Atlanta 5221.5.
 * Women's medians: London 4739, Dublin 5190, Maastricht 5526, Utrecht 5608, Atlanta 5629.
 * Maastricht is the middle venue for both genders.
 */
export const FIVE_VENUES: ResultRecord[] = [
  ...rec("London", "M", 4100, 4046, 4000),
  ...rec("London", "W", 4700, 4739, 4800),
  ...rec("Dublin", "M", 4400, 4495, 4600),
  ...rec("Dublin", "W", 5100, 5190, 5300),
  ...rec("Maastricht", "M", 4700, 4800, 4900),
  ...rec("Maastricht", "W", 5400, 5526, 5600),
  ...rec("Utrecht", "M", 4800, 4905, 5000),
  ...rec("Utrecht", "W", 5500, 5608, 5700),
  ...rec("Atlanta", "M", 5100, 5221.5, 5400),
  ...rec("Atlanta", "W", 5500, 5629, 5800),
];

/** Men only; median 4600 (offset -200 against Maastricht). */
export const SOLO_MEN: ResultRecord[] = rec("Solo", "M", 4500, 4600, 4700);
