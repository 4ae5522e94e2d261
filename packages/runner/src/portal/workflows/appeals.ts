import { z } from 'zod';
import type { ExtractedPage, PortalResult } from '../types.js';
import { cleanText, keyPart, requiredText } from './common.js';

export const APPEAL_SEARCH_MODES = ['claim_number', 'member_id', 'patient_name'] as const;

export const AppealsSchema = z.object({
  searchBy: z.enum(APPEAL_SEARCH_MODES),
  searchTerm: requiredText,
});

export type AppealsData = z.infer<typeof AppealsSchema>;

export function appealsKey(data: AppealsData): string {
  return ['appeals', data.searchBy, keyPart(data.searchTerm)].join(':');
}

export function summarizeAppeals(page: ExtractedPage): PortalResult {
  return {
    result: { appealsFound: page.rows.length },
    lines: page.rows.map((row) => ({
      category: 'appeal',
      data: Object.fromEntries(Object.entries(row).map(([name, text]) => [name, cleanText(text)])),
    })),
  };
}
