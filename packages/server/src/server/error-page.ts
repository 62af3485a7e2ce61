/**
 * HTML page shown by `/` when the manifest cannot be rendered.
 */

import { escapeHtml } from '@pageforge/utils';

export function renderErrorPage(title: string, message: string): string {
    return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>pageforge: ${escapeHtml(title)}</title>
  <style>
    body { font-family: system-ui, sans-serif; background: #1e1e2e; color: #f5f5f5; margin: 0; padding: 2rem; }
    .error { max-width: 720px; margin: 4rem auto; border-left: 4px solid #f38ba8; padding: 1rem 1.5rem; background: #2a2a3c; }
    h1 { margin-top: 0; font-size: 1.5rem; }
    pre { white-space: pre-wrap; font-size: 0.9rem; }
  </style>
</head>
<body>
  <div class="error">
    <h1>${escapeHtml(title)}</h1>
    <pre>${escapeHtml(message)}</pre>
  </div>
</body>
</html>
`;
}
