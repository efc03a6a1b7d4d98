import { defineExtension } from '@/core/pipeline';
import type { Extension } from '@/types';

const INDENT = '  ';

/**
 * Render a DESCRIPTION section, indenting every line of `text`.
 */
export function renderDescriptionSection(text: string): string {
  const body = text
    .split('\n')
    .map((line) => (line ? `${INDENT}${line}` : line))
    .join('\n');
  return `DESCRIPTION:\n${body}`;
}

/**
 * Appends a DESCRIPTION section to the command's further information,
 * after a blank line when there is existing content.
 */
export function longDescription(text: string): Extension {
  const section = renderDescriptionSection(text);
  return defineExtension({
    name: 'longDescription',
    extend: (command) => ({
      ...command,
      furtherInformation: command.furtherInformation
        ? `${command.furtherInformation}\n\n${section}`
        : section,
    }),
  });
}
