/**
 * Next fire time for a cadence. Calendar cadences use local wall-clock
 * time, so a daily 09:30 task stays at 09:30 across DST changes.
 */

import { Duration } from "../shared/time.js";
import { type Cadence, Frequency, type TimeOfDay, WEEKDAYS } from "./types.js";

/** Longest gap between two matching calendar days (a 31st can be two months away). */
const MAX_DAYS_AHEAD = 366;

/** First fire time strictly after `fromMs`. */
export function nextRunAt(cadence: Cadence, fromMs: number): number {
	switch (cadence.frequency) {
		case Frequency.Seconds:
			return fromMs + Duration.seconds(cadence.seconds);
		case Frequency.Hourly:
			return fromMs + Duration.hours(1);
		case Frequency.Daily:
		case Frequency.Once:
			return nextTimeOfDay(fromMs, cadence.at, () => true);
		case Frequency.Weekly: {
			const weekday = WEEKDAYS.indexOf(cadence.day);
			return nextTimeOfDay(fromMs, cadence.at, (date) => date.getDay() === weekday);
		}
		case Frequency.Monthly:
			return nextTimeOfDay(fromMs, cadence.at, (date) => date.getDate() === cadence.dayOfMonth);
	}
}

function nextTimeOfDay(fromMs: number, at: TimeOfDay, matches: (date: Date) => boolean): number {
	const candidate = new Date(fromMs);
	for (let day = 0; day <= MAX_DAYS_AHEAD; day++) {
		candidate.setHours(at.hour, at.minute, 0, 0);
		if (candidate.getTime() > fromMs && matches(candidate)) {
			return candidate.getTime();
		}
		candidate.setDate(candidate.getDate() + 1);
	}
	throw new Error(`No matching day within ${MAX_DAYS_AHEAD} days`);
}
