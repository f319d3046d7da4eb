/**
 * Landing page with a small form for trying the lookup from a browser
 */

import { MEASURES } from '../types/index.js';

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderIndexPage(endpoint = '/county_data'): string {
  const options = [...MEASURES]
    .sort()
    .map((measure) => `        <option value="${escapeHtml(measure)}">${escapeHtml(measure)}</option>`)
    .join('\n');

  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <title>County Health Lookup</title>
    <style>
      body { font-family: system-ui, sans-serif; max-width: 48rem; margin: 2rem auto; padding: 0 1rem; }
      label { display: block; margin-top: 1rem; }
      pre { background: #f4f4f4; padding: 1rem; overflow-x: auto; }
    </style>
  </head>
  <body>
    <h1>County Health Lookup</h1>
    <form id="lookup">
      <label>ZIP code <input name="zip" pattern="\\d{5}" maxlength="5" required></label>
      <label>Measure
        <select name="measure_name">
${options}
        </select>
      </label>
      <button type="submit">Look up</button>
    </form>
    <pre id="result"></pre>
    <script>
      document.getElementById('lookup').addEventListener('submit', async (event) => {
        event.preventDefault();
        const form = new FormData(event.target);
        const response = await fetch(${JSON.stringify(endpoint)}, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ zip: form.get('zip'), measure_name: form.get('measure_name') }),
        });
        const body = await response.json();
        document.getElementById('result').textContent = response.status + '\\n' + JSON.stringify(body, null, 2);
      });
    </script>
  </body>
</html>
`;
}
