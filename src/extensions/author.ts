import { defineExtension } from '@/core/pipeline';
import type { Extension } from '@/types';

/** Prepends the author's name as the first line of the description. */
export function author(name: string): Extension {
  return defineExtension({
    name: 'author',
    extend: (command) => ({ ...command, description: `${name}\n${command.description}` }),
  });
}
