// web/src/app/pages/habits/habits.page.ts
import { CADENCES } from '@streakboard/data-models';
import type { Dashboard, HabitCard } from '../../habit.service';
import { html, type SafeHtml } from '../../components/html';
import { flashMessages, layout, type Flash } from '../../components/layout';
import {
  checkinTimeline,
  percentText,
  streakColor,
  streakText,
} from '../../components/checkin-timeline/checkin-timeline.component';

/** `Monday, January 15, 2024` */
export function formatToday(date: Date): string {
  return date.toLocaleDateString('en-US', { weekday: 'long', year: 'numeric', month: 'long', day: 'numeric' });
}

function sidebar(dashboard: Dashboard): SafeHtml {
  return html`<aside>
    <h2>➕ Add New Habit</h2>
    <form method="post" action="/habits">
      <label for="name">Habit name</label>
      <input id="name" name="name" placeholder="e.g., Exercise, Read, Meditate" maxlength="80">
      <label for="cadence">Repeats</label>
      <select id="cadence" name="cadence">
        ${CADENCES.map((c) => html`<option value="${c}">${c}</option>`)}
      </select>
      <p><button type="submit">Add Habit</button></p>
    </form>
    ${dashboard.habits.length > 0
      ? html`<h2>🗑️ Remove Habit</h2>
        <form method="post" action="/habits/delete">
          <label for="remove">Select habit to remove</label>
          <select id="remove" name="name">
            ${dashboard.habits.map((h) => html`<option value="${h.name}">${h.name}</option>`)}
          </select>
          <p><button type="submit">Remove</button></p>
        </form>`
      : ''}
  </aside>`;
}

function habitRow(card: HabitCard): SafeHtml {
  const action = card.done ? '/habits/undo' : '/habits/complete';
  return html`<tr>
    <td><strong>${card.name}</strong><br><small>${card.cadence}</small></td>
    <td>
      <form class="inline" method="post" action="${action}">
        <input type="hidden" name="name" value="${card.name}">
        <button type="submit" aria-pressed="${card.done ? 'true' : 'false'}">${card.done ? '✅ Done' : '⬜ Mark done'}</button>
      </form>
    </td>
    <td style="color: ${streakColor(card.currentStreak, card.cadence)}">${streakText(card.currentStreak, card.cadence)}</td>
    <td>${card.longestStreak}</td>
    <td>${checkinTimeline(card.window)}</td>
    <td>${percentText(card.windowRate)}</td>
  </tr>`;
}

function habitsTable(dashboard: Dashboard): SafeHtml {
  return html`<h2>Your Habits</h2>
    <table>
      <thead>
        <tr><th>Habit</th><th>Status</th><th>Streak</th><th>Best</th><th>Recent</th><th>Rate</th></tr>
      </thead>
      <tbody>${dashboard.habits.map(habitRow)}</tbody>
    </table>`;
}

function progressSection(dashboard: Dashboard): SafeHtml {
  const { count, target, percent } = dashboard.progress;
  return html`<h2>Current Progress</h2>
    <progress value="${count}" max="${target}">${percentText(percent)}</progress>
    <p><strong>${count}/${target}</strong> habits completed</p>`;
}

function overviewSection(dashboard: Dashboard): SafeHtml {
  return html`<h2>📊 Last 7 Days</h2>
    <div class="overview">
      ${dashboard.lastSevenDays.map(
        (d) => html`<div title="${d.dateKey}"><small>${d.label}</small><br><strong>${d.completed}/${d.total}</strong></div>`
      )}
    </div>`;
}

export function renderHabitsPage(dashboard: Dashboard, flash: Flash = {}): string {
  const body =
    dashboard.habits.length === 0
      ? html`<p class="flash notice">👈 Add your first habit using the form on the left!</p>`
      : html`${habitsTable(dashboard)} ${progressSection(dashboard)} ${overviewSection(dashboard)}`;

  return layout(
    'Habits',
    html`${sidebar(dashboard)}
      <section>
        <h1>📅 Today: ${formatToday(dashboard.today)}</h1>
        ${flashMessages(flash)}
        ${body}
      </section>`,
    { username: dashboard.username }
  );
}
