import chalk from 'chalk';

export function getStatusColor(status: string): (text: string) => string {
  switch (status) {
    case 'completed':
      return chalk.green;
    case 'processing':
    case 'analyzing':
      return chalk.blue;
    case 'queued':
      return chalk.yellow;
    case 'failed':
      return chalk.red;
    default:
      return chalk.white;
  }
}

export function truncate(text: string, width: number): string {
  return text.length > width ? '...' + text.slice(-(width - 3)) : text;
}

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&nbsp;': ' ',
};

/**
 * Render the summary HTML as plain terminal text
 */
export function htmlToText(html: string): string {
  return html
    .replace(/<li[^>]*>/gi, '  • ')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|h[1-6]|li|ul|ol|pre|div)>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&(amp|lt|gt|quot|#39|nbsp);/g, (entity) => ENTITIES[entity] ?? entity)
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
