// web/src/app/pages/login/login.page.ts
import { html } from '../../components/html';
import { flashMessages, layout, type Flash } from '../../components/layout';

export function renderLoginPage(options: { username?: string } & Flash = {}): string {
  return layout(
    'Log in',
    html`<h1>Log in</h1>
      ${flashMessages(options)}
      <form method="post" action="/login">
        <label for="username">Username</label>
        <input id="username" name="username" autocomplete="username" value="${options.username ?? ''}" required>
        <label for="password">Password</label>
        <input id="password" name="password" type="password" autocomplete="current-password" required>
        <p><button type="submit">Log in</button></p>
      </form>
      <p>No account yet? <a href="/register">Register with an access code</a>.</p>`,
    { narrow: true }
  );
}
