// web/src/app/components/checkin-timeline/checkin-timeline.component.ts
import type { Cadence } from '@streakboard/data-models';
import type { WindowEntry } from '@streakboard/streaks';
import { html, type SafeHtml } from '../html';

/** Ungefähre Tage je Periode – für die Farbskala über alle Kadenzen */
const DAYS_PER_PERIOD: Readonly<Record<Cadence, number>> = { daily: 1, weekly: 7, monthly: 30 };

const UNIT: Readonly<Record<Cadence, string>> = { daily: 'day', weekly: 'week', monthly: 'month' };

/** Farbskala nach *Tagen* */
export function colorForStreakDays(days: number): string {
  if (days >= 365) return '#ef4444'; // rot
  if (days >= 186) return '#d946ef'; // magenta
  if (days >= 93) return '#3b82f6'; // blau
  if (days >= 31) return '#06b6d4'; // cyan
  if (days >= 7) return '#22c55e'; // grün
  return '#ffc400'; // gelb (0–6)
}

export function streakColor(streak: number, cadence: Cadence): string {
  return colorForStreakDays(streak * DAYS_PER_PERIOD[cadence]);
}

/** `🔥 3 days`, `🔥 1 week` – oder `—` ohne Serie */
export function streakText(streak: number, cadence: Cadence): string {
  if (streak <= 0) return '—';
  return `🔥 ${streak} ${UNIT[cadence]}${streak === 1 ? '' : 's'}`;
}

export function percentText(rate: number): string {
  return `${Math.round(rate * 100)}%`;
}

/** Streifen der letzten Perioden, älteste links */
export function checkinTimeline(window: readonly WindowEntry[]): SafeHtml {
  return html`<ol class="timeline">${window.map(
    (e) => html`<li class="${e.completed ? 'done' : 'open'}" title="${e.periodKey}">${e.label}</li>`
  )}</ol>`;
}
