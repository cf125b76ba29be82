// web/src/app/pages/register/register.page.ts
import { html } from '../../components/html';
import { flashMessages, layout, type Flash } from '../../components/layout';

export function renderRegisterPage(options: { username?: string; accessCode?: string } & Flash = {}): string {
  return layout(
    'Register',
    html`<h1>Create your account</h1>
      ${flashMessages(options)}
      <form method="post" action="/register">
        <label for="username">Username</label>
        <input id="username" name="username" autocomplete="username" value="${options.username ?? ''}" required>
        <label for="password">Password</label>
        <input id="password" name="password" type="password" autocomplete="new-password" minlength="8" required>
        <label for="accessCode">Access code</label>
        <input id="accessCode" name="accessCode" value="${options.accessCode ?? ''}" required>
        <p><button type="submit">Register</button></p>
      </form>
      <p>Already registered? <a href="/login">Log in</a>.</p>`,
    { narrow: true }
  );
}
