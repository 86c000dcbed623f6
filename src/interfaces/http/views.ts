const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch);
}

export function renderIndexPage(result?: string): string {
  const resultBlock =
    result === undefined
      ? ""
      : `\n    <p class="result">Prediction: <strong>${escapeHtml(result)}</strong></p>`;

  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <title>Text classifier</title>
  </head>
  <body>
    <h1>Text classifier</h1>
    <form method="post" action="/predict">
      <textarea name="text" rows="6" cols="60" required></textarea>
      <button type="submit">Predict</button>
    </form>${resultBlock}
  </body>
</html>
`;
}
