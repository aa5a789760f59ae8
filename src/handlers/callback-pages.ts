/**
 * Pages returned to the browser that followed the authorization redirect.
 */

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => ESCAPES[char] ?? char);
}

function page(title: string, body: string, accent: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>${title}</title>
  <style>
    body { font-family: system-ui, sans-serif; margin: 0; min-height: 100vh;
      display: grid; place-items: center; background: #f6f7f9; color: #333; }
    main { background: #fff; padding: 2.5rem 3rem; border-radius: 8px;
      box-shadow: 0 1px 8px rgba(0, 0, 0, 0.08); text-align: center; }
    h1 { color: ${accent}; font-size: 1.4rem; }
    code { background: #f1f1f1; padding: 0.2rem 0.4rem; border-radius: 4px; }
  </style>
</head>
<body>
  <main>
    <h1>${title}</h1>
    ${body}
  </main>
</body>
</html>`;
}

export function successPage(): string {
  return page(
    'Authorization complete',
    '<p>You can close this window and return to the application.</p>',
    '#1a7f37'
  );
}

export function failurePage(detail: string): string {
  return page(
    'Authorization failed',
    `<p><code>${escapeHtml(detail)}</code></p>
    <p>Close this window and start the authorization again.</p>`,
    '#cf222e'
  );
}
