/**
 * Markdown building blocks for the PRD renderer.
 */

export function cell(value: string | undefined | null): string {
  if (value === undefined || value === null || value.length === 0) return '-';
  return value.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|').trim();
}

export function inlineCode(value: string): string {
  if (!value.includes('`')) return `\`${value}\``;
  return `\`\` ${value} \`\``;
}

/**
 * Fenced block whose fence is longer than any backtick run in the content,
 * so the content is reproduced unchanged.
 */
export function fence(content: string, language = ''): string {
  const longestRun = Math.max(0, ...Array.from(content.matchAll(/`+/g), m => m[0].length));
  const marker = '`'.repeat(Math.max(3, longestRun + 1));
  return `${marker}${language}\n${content}\n${marker}`;
}

export function table(headers: string[], rows: string[][]): string {
  const lines = [
    `| ${headers.join(' | ')} |`,
    `| ${headers.map(() => '---').join(' | ')} |`,
    ...rows.map(row => `| ${row.join(' | ')} |`),
  ];
  return lines.join('\n');
}

export function list(items: string[]): string {
  return items.map(item => `- ${item}`).join('\n');
}
