import { Marked } from 'marked';

const markdown = new Marked(
  {
    gfm: true, // GitHub Flavored Markdown, also autolinks bare URLs
    breaks: true // Convert \n to <br>
  },
  {
    // Digests carry feed and model text; raw HTML in it is shown, never rendered
    renderer: { html: (html: string) => escapeHtml(html) }
  }
);

const STYLES = `
  body { font-family: sans-serif; line-height: 1.6; max-width: 800px; margin: 0 auto; padding: 20px; }
  a { color: #0366d6; text-decoration: underline; }
  a:hover { color: #044289; }
  pre { background-color: #f6f8fa; padding: 16px; overflow: auto; }
  blockquote { border-left: 4px solid #dfe2e5; padding: 0 1em; color: #6a737d; margin: 0; }
  hr { border: 0; border-top: 1px solid #e1e4e8; margin: 2em 0; }`;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

/**
 * Render digest Markdown as a standalone, styled HTML page
 */
export async function renderDigestHtml(markdownContent: string, title: string): Promise<string> {
  const body = await markdown.parse(markdownContent);
  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(title)}</title>
  <style>${STYLES}
  </style>
</head>
<body>
${body}
</body>
</html>
`;
}
