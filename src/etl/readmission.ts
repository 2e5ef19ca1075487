import { subDays } from 'date-fns';
import type { FactEncounter, SourceEncounter } from '../drizzle/types';
import { INPATIENT_ENCOUNTER_TYPE, READMISSION_WINDOW_DAYS } from '../config/etl';
import { normalizeEncounterType } from './dimensions';
import { parseSourceDate } from './calendar';

interface TimelineEntry {
  encounterId: number;
  time: number;
  windowStart: number;
  inpatient: boolean;
}

function isInpatient(encounterType: string | null): boolean {
  return encounterType !== null && normalizeEncounterType(encounterType) === INPATIENT_ENCOUNTER_TYPE;
}

function groupTimelines(encounters: SourceEncounter[], windowDays: number): Map<number, TimelineEntry[]> {
  const timelines = new Map<number, TimelineEntry[]>();

  for (const encounter of encounters) {
    if (encounter.patientId === null || encounter.encounterDate === null) {
      continue;
    }
    const date = parseSourceDate(encounter.encounterDate, 'encounters', 'encounter_date');
    const entry: TimelineEntry = {
      encounterId: encounter.encounterId,
      time: date.getTime(),
      windowStart: subDays(date, windowDays).getTime(),
      inpatient: isInpatient(encounter.encounterType),
    };

    const timeline = timelines.get(encounter.patientId);
    if (timeline) {
      timeline.push(entry);
    } else {
      timelines.set(encounter.patientId, [entry]);
    }
  }

  return timelines;
}

/**
 * Returns the ids of encounters preceded by an inpatient encounter of the same
 * patient in `[date - windowDays, date)`. The current encounter's own type
 * does not matter, and each encounter is judged on its own.
 *
 * Each patient's encounters are sorted once and swept with two cursors over
 * the inpatient subsequence, so the cost is dominated by the sort.
 */
export function findReadmissions(
  encounters: SourceEncounter[],
  windowDays: number = READMISSION_WINDOW_DAYS
): Set<number> {
  const readmissions = new Set<number>();

  for (const timeline of groupTimelines(encounters, windowDays).values()) {
    timeline.sort((a, b) => a.time - b.time || a.encounterId - b.encounterId);
    const inpatientTimes = timeline.filter(e => e.inpatient).map(e => e.time);

    let windowLow = 0;
    let windowHigh = 0;
    for (const entry of timeline) {
      while (windowHigh < inpatientTimes.length && inpatientTimes[windowHigh] < entry.time) {
        windowHigh++;
      }
      while (windowLow < windowHigh && inpatientTimes[windowLow] < entry.windowStart) {
        windowLow++;
      }
      if (windowHigh > windowLow) {
        readmissions.add(entry.encounterId);
      }
    }
  }

  return readmissions;
}

export interface ReadmissionResult {
  facts: FactEncounter[];
  flagged: number;
}

/** Re-derives the indicator for every staged fact from the full source history. */
export function classifyReadmissions(
  facts: FactEncounter[],
  encounters: SourceEncounter[],
  windowDays: number = READMISSION_WINDOW_DAYS
): ReadmissionResult {
  const readmissions = findReadmissions(encounters, windowDays);

  let flagged = 0;
  const classified = facts.map(fact => {
    const isReadmission = readmissions.has(fact.encounterId);
    if (isReadmission) {
      flagged++;
    }
    return { ...fact, isReadmission };
  });

  return { facts: classified, flagged };
}
