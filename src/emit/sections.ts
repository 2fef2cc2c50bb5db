import type { Directive, Program, Section } from '../x86/types.js';

export const DEFAULT_SECTION = '.text';

/**
 * Group a flat program by section.
 *
 * - `.text` is current at the start, so it is always present (possibly empty).
 * - A `section` directive naming exactly one target switches the current section.
 * - A `section` directive naming several targets is a structural marker and lands in no section.
 * - Map iteration order is the order in which section names were first seen.
 */
export function splitSections(program: Program): Map<string, Section> {
  const bodies = new Map<string, Directive[]>();

  const sectionBody = (name: string): Directive[] => {
    let body = bodies.get(name);
    if (!body) {
      body = [];
      bodies.set(name, body);
    }
    return body;
  };

  let current = sectionBody(DEFAULT_SECTION);
  for (const d of program) {
    if (d.kind === 'section') {
      const [only, ...rest] = d.names;
      if (only !== undefined && rest.length === 0) current = sectionBody(only);
      continue;
    }
    current.push(d);
  }

  const sections = new Map<string, Section>();
  for (const [name, body] of bodies) {
    sections.set(name, { name, directives: Object.freeze([...body]) });
  }
  return sections;
}
