/**
 * A small services contract shared by the search and navigation tests.
 *
 * 160 lines; blank lines pad the sections so the TERMINATION section
 * spans lines 120-140. The last line is not blank, so no trailing
 * newline is dropped when the document is created.
 */

import { createDocument } from '../document/document.js';
import { buildForest } from '../document/forest.js';
import type { Document, RawSection, SectionForest } from '../types/document.js';

const LINE_COUNT = 160;

const CONTENT: Record<number, string> = {
  1: 'PREAMBLE',
  2: 'MASTER SERVICES AGREEMENT between the parties Acme Corp and Beta LLC.',
  11: '1. SERVICES',
  12: 'Beta shall provide consulting services to Acme.',
  61: '2. PAYMENT',
  62: 'Acme shall pay all fees within 30 days of invoice.',
  70: 'Repeated late payment allows Beta to cancel the services.',
  120: 'TERMINATION',
  121: 'Either party may terminate this agreement upon 60 days written notice.',
  122: 'Termination for cause requires a material breach, as described in Exhibit A.',
  141: 'EXHIBIT A - BREACH EVENTS',
  142: 'A material breach includes failure to pay within 90 days.',
  160: 'End of exhibit.',
};

export const CONTRACT_SECTIONS: RawSection[] = [
  { title: 'PREAMBLE', start_line: 1, end_line: 10, level: 1 },
  { title: '1. SERVICES', start_line: 11, end_line: 60, level: 1 },
  { title: '2. PAYMENT', start_line: 61, end_line: 119, level: 1 },
  { title: 'TERMINATION', start_line: 120, end_line: 140, level: 1 },
  { title: 'EXHIBIT A - BREACH EVENTS', start_line: 141, end_line: 160, level: 1 },
];

export const CONTRACT_TEXT = Array.from({ length: LINE_COUNT }, (_, i) => CONTENT[i + 1] ?? '').join('\n');

export function contractDocument(path = '/srv/contracts/msa.txt'): Document {
  return createDocument(CONTRACT_TEXT, path);
}

export function contractForest(): SectionForest {
  return buildForest(CONTRACT_SECTIONS, LINE_COUNT);
}
