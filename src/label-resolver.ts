import { LabelResolver } from './types';

const LEADING_LABEL = /^\d+/;

/**
 * Default lookup: the first loaded line whose text starts with the target.
 * A target of `1` therefore also finds a line labelled `10`.
 */
export const prefixLabelResolver: LabelResolver = (lines, target) => {
  for (let i = 0; i < lines.length; i++) {
    if (lines[i].startsWith(target)) {
      return i;
    }
  }
  return -1;
};

// Only a line whose numeric label is exactly the target
export const exactLabelResolver: LabelResolver = (lines, target) => {
  for (let i = 0; i < lines.length; i++) {
    const label = LEADING_LABEL.exec(lines[i]);
    if (label && label[0] === target) {
      return i;
    }
  }
  return -1;
};

export function stripLabel(line: string): string {
  return line.replace(LEADING_LABEL, '').trim();
}
