import { html } from 'hono/html';
import { CLEAR_MARKER, DIGITS, SECTION_LETTERS, type Signal, type Snapshot } from '@director/signal';

export type Fragment = ReturnType<typeof html>;

const HTMX_SRC = 'https://unpkg.com/htmx.org@1.9.12';

export const POLL_TRIGGERS = 'load, htmx:sendError delay:2s, htmx:responseError delay:2s';

// Keeps the display's line box when nothing is showing
const ZERO_WIDTH_SPACE = '\u200b';

export function displayText(signal: Signal): string {
  return signal === CLEAR_MARKER ? ZERO_WIDTH_SPACE : signal;
}

/**
 * The shared display element. It long-polls /view with its own revision as
 * soon as it is swapped in, and the response replaces it with the next one,
 * so each page keeps exactly one poll in flight. A failed poll swaps nothing
 * in, so the element retries itself after a pause until the server answers.
 */
export function sectionDisplay(snapshot: Snapshot): Fragment {
  return html`<div id="section-display" class="section-display" data-revision="${snapshot.revision}" hx-get="/view?since=${snapshot.revision}" hx-trigger="${POLL_TRIGGERS}" hx-swap="outerHTML">${displayText(snapshot.signal)}</div>`;
}

export function layout(title: string, body: Fragment): Fragment {
  return html`<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${title}</title>
    <link rel="stylesheet" href="/styles.css" />
    <script src="${HTMX_SRC}"></script>
  </head>
  <body>
    ${body}
  </body>
</html>`;
}

export function controllerPage(snapshot: Snapshot): Fragment {
  return layout(
    'Song Director',
    html`<main class="director">
      ${sectionDisplay(snapshot)}
      <form class="letters" hx-put="/section/type" hx-swap="none">
        ${SECTION_LETTERS.map((letter) => html`<button type="submit" name="section_type" value="${letter}">${letter}</button>`)}
      </form>
      <form class="digits" hx-put="/section/number" hx-swap="none">
        ${DIGITS.map((digit) => html`<button type="submit" name="section_number" value="${digit}">${digit}</button>`)}
      </form>
      <button class="clear" hx-delete="/section" hx-swap="none">Clear</button>
    </main>`,
  );
}

export function viewerPage(snapshot: Snapshot): Fragment {
  return layout('Song Section', html`<main class="viewer">${sectionDisplay(snapshot)}</main>`);
}
