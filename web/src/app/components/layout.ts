// web/src/app/components/layout.ts
import { html, SafeHtml } from './html';

export interface Flash {
  notice?: string;
  error?: string;
}

const STYLES = `
  body { font-family: system-ui, sans-serif; margin: 0; background: #0f172a; color: #e2e8f0; }
  header { display: flex; justify-content: space-between; align-items: center; padding: 1rem 2rem; background: #111827; }
  main { display: grid; grid-template-columns: 18rem 1fr; gap: 2rem; padding: 2rem; }
  main.narrow { display: block; max-width: 24rem; margin: 0 auto; }
  a { color: #38bdf8; }
  table { width: 100%; border-collapse: collapse; }
  th, td { text-align: left; padding: .5rem; border-bottom: 1px solid #1f2937; }
  .flash { padding: .75rem 1rem; border-radius: .5rem; margin-bottom: 1rem; }
  .flash.notice { background: #14532d; }
  .flash.error { background: #7f1d1d; }
  .timeline { display: flex; gap: .25rem; list-style: none; margin: 0; padding: 0; }
  .timeline li { width: 2.5rem; text-align: center; font-size: .75rem; border-radius: .25rem; padding: .25rem 0; }
  .timeline li.done { background: #22c55e; color: #0f172a; }
  .timeline li.open { background: #1f2937; }
  .overview { display: grid; grid-template-columns: repeat(7, 1fr); gap: .5rem; }
  .overview div { background: #111827; padding: .75rem; border-radius: .5rem; text-align: center; }
  progress { width: 100%; height: 1rem; }
  form.inline { display: inline; }
  label { display: block; margin: .5rem 0 .25rem; }
`;

export function flashMessages(flash: Flash = {}): SafeHtml {
  return html`
    ${flash.notice ? html`<p class="flash notice" role="status">${flash.notice}</p>` : ''}
    ${flash.error ? html`<p class="flash error" role="alert">${flash.error}</p>` : ''}
  `;
}

/** HTML-Gerüst für jede Seite; `username` blendet den Logout-Button ein. */
export function layout(title: string, content: SafeHtml, options: { username?: string; narrow?: boolean } = {}): string {
  return html`<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <title>${title} · Streakboard</title>
    <style>${new SafeHtml(STYLES)}</style>
  </head>
  <body>
    <header>
      <strong>📋 Streakboard</strong>
      ${options.username
        ? html`<form class="inline" method="post" action="/logout">
            <span>${options.username}</span> <button type="submit">Log out</button>
          </form>`
        : ''}
    </header>
    <main class="${options.narrow ? 'narrow' : ''}">${content}</main>
  </body>
</html>`.value;
}
