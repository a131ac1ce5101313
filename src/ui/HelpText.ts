/**
 * HelpText – renders help content as plain text for the terminal.
 *
 * Content is an array of { heading, body } sections, the same shape a
 * game uses to describe its rules.
 */

/** A single content section of a help screen. */
export interface HelpSection {
  heading: string;
  body: string;
}

/**
 * Render help sections: each heading underlined, followed by its body
 * and a blank line.
 */
export function renderHelp(sections: readonly HelpSection[]): string {
  return sections
    .map(({ heading, body }) =>
      [heading, '-'.repeat(heading.length), body].join('\n'),
    )
    .join('\n\n');
}
