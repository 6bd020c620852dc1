import { ReportBlock, ReportCell, ReportDocument } from "../models/_types";

export type ReportFormat = "json" | "markdown" | "html";

const EMPTY_CELL = "-";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;"
};

export const escapeHtml = (value: string) => value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

const cellText = (cell: ReportCell) => (cell === null ? EMPTY_CELL : String(cell));

// Markdown

const escapeTableCell = (value: string) => value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");

function markdownBlock(block: ReportBlock): string {
  switch (block.type) {
    case "paragraph":
      return block.text;
    case "note":
      return `> _Note: ${block.text}_`;
    case "bullets":
      return block.items.map((item) => `- ${item}`).join("\n");
    case "table": {
      const header = `| ${block.columns.map(escapeTableCell).join(" | ")} |`;
      const divider = `|${block.columns.map(() => "---").join("|")}|`;
      const rows = block.rows.map((row) => `| ${row.map((cell) => escapeTableCell(cellText(cell))).join(" | ")} |`);
      return [header, divider, ...rows].join("\n");
    }
  }
}

export function renderMarkdown(report: ReportDocument): string {
  const parts = [`# ${report.title}`, ...report.subtitle.map((line) => `_${line}_`)];
  for (const section of report.sections) {
    parts.push(`## ${section.heading}`);
    parts.push(...section.blocks.map(markdownBlock));
  }
  if (report.footer) {
    parts.push("---", `_${report.footer}_`);
  }
  return `${parts.join("\n\n")}\n`;
}

// HTML

const STYLES = `body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif; max-width: 900px; margin: 2rem auto; padding: 0 1rem; line-height: 1.6; color: #333; }
table { border-collapse: collapse; width: 100%; margin: 1rem 0; }
th, td { border: 1px solid #ddd; padding: 0.5rem; text-align: left; }
th { background: #f0f0f0; }
.note { border-left: 4px solid #c9a227; background: #fdf8e4; padding: 0.5rem 1rem; }
.subtitle { color: #666; margin: 0; }
footer { margin-top: 2rem; color: #666; font-size: 0.9rem; }`;

function htmlBlock(block: ReportBlock): string {
  switch (block.type) {
    case "paragraph":
      return `<p>${escapeHtml(block.text)}</p>`;
    case "note":
      return `<p class="note">${escapeHtml(block.text)}</p>`;
    case "bullets":
      return `<ul>\n${block.items.map((item) => `<li>${escapeHtml(item)}</li>`).join("\n")}\n</ul>`;
    case "table": {
      const head = block.columns.map((column) => `<th>${escapeHtml(column)}</th>`).join("");
      const body = block.rows
        .map((row) => `<tr>${row.map((cell) => `<td>${escapeHtml(cellText(cell))}</td>`).join("")}</tr>`)
        .join("\n");
      return `<table>\n<thead><tr>${head}</tr></thead>\n<tbody>\n${body}\n</tbody>\n</table>`;
    }
  }
}

export function renderHtml(report: ReportDocument): string {
  const body = [
    `<h1>${escapeHtml(report.title)}</h1>`,
    ...report.subtitle.map((line) => `<p class="subtitle">${escapeHtml(line)}</p>`)
  ];
  for (const section of report.sections) {
    body.push(`<section>\n<h2>${escapeHtml(section.heading)}</h2>\n${section.blocks.map(htmlBlock).join("\n")}\n</section>`);
  }
  if (report.footer) {
    body.push(`<footer>${escapeHtml(report.footer)}</footer>`);
  }
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${escapeHtml(report.title)}</title>
<style>
${STYLES}
</style>
</head>
<body>
${body.join("\n")}
</body>
</html>
`;
}
