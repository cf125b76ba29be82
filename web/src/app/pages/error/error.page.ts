// web/src/app/pages/error/error.page.ts
import { html } from '../../components/html';
import { layout } from '../../components/layout';

export function renderErrorPage(message: string): string {
  return layout(
    'Error',
    html`<h1>Something went wrong</h1>
      <p class="flash error" role="alert">${message}</p>
      <p><a href="/">Back to your habits</a></p>`,
    { narrow: true }
  );
}
