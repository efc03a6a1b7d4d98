/**
 * Insert a child command whose handler needs the parent it ends up in.
 *
 * Commands are immutable values, so a child cannot hold a reference to a
 * parent that does not exist yet. The child is appended with a placeholder
 * handler first, the real handler is built from that intermediate parent, and
 * the placeholder is then swapped out in place.
 */

import type { Command, RunHandler } from '@/types';

const placeholder: RunHandler = () => 0;

export function appendSelfReferentialChild(
  parent: Command,
  child: Command,
  makeRun: (parentWithChild: Command) => RunHandler,
): Command {
  const index = parent.subCommands.length;
  const pending: Command = { ...child, run: placeholder };
  const intermediate: Command = { ...parent, subCommands: [...parent.subCommands, pending] };

  const finished: Command = { ...pending, run: makeRun(intermediate) };

  return {
    ...intermediate,
    subCommands: intermediate.subCommands.map((sub, i) => (i === index ? finished : sub)),
  };
}
