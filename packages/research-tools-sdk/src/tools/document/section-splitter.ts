/**
 * Break before structural headers: FORM, Chapter, Rule and SCHEDULE
 * headings, and all-caps lines of ten or more characters. The look-ahead
 * keeps each header at the start of its own section.
 */
const SECTION_BOUNDARY =
  /\n(?=[ \t]*(?:FORM\s+\w|Chapter\s+\w|Rule\s+\d|SCHEDULE\s+\w|[A-Z][A-Z \t]{9,}$))/m;

export const splitSections = (text: string): string[] =>
  text.split(SECTION_BOUNDARY);

export const splitParagraphs = (text: string): string[] =>
  text.split(/\n[ \t]*\n/);

export const splitSentences = (text: string): string[] =>
  text.split(/(?<=[.!?])\s+/);
