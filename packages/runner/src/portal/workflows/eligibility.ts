import { z } from 'zod';
import type { PortalResult, ExtractedPage } from '../types.js';
import { cleanText, isoDate, keyPart, npi, optionalText, parseAmount, requiredText } from './common.js';

export const EligibilitySchema = z
  .object({
    payerName: requiredText,
    memberId: z.string().trim().min(1, 'Required').max(80),
    patientLastName: requiredText,
    patientFirstName: optionalText,
    dateOfBirth: isoDate,
    dosFrom: isoDate,
    dosTo: isoDate.optional(),
    serviceTypeCode: z.string().trim().min(1).max(10).optional(),
    providerNpi: npi.optional(),
    providerName: optionalText,
  })
  .refine((data) => !data.dosTo || data.dosTo >= data.dosFrom, {
    message: 'dosTo must not be before dosFrom',
    path: ['dosTo'],
  });

export type EligibilityData = z.infer<typeof EligibilitySchema>;

const MONEY_FIELDS = ['deductibleIndividual', 'deductibleRemaining', 'outOfPocketMax', 'outOfPocketRemaining'];

export function eligibilityKey(data: EligibilityData): string {
  return [
    'eligibility',
    keyPart(data.payerName),
    keyPart(data.memberId),
    data.dosFrom,
    keyPart(data.dosTo),
    keyPart(data.serviceTypeCode),
  ].join(':');
}

export function summarizeEligibility(page: ExtractedPage): PortalResult {
  const result: Record<string, unknown> = {};
  for (const [name, text] of Object.entries(page.fields)) {
    result[name] = MONEY_FIELDS.includes(name) ? parseAmount(text) : cleanText(text);
  }
  result.benefitLineCount = page.rows.length;

  return {
    result,
    lines: page.rows.map((row) => ({
      category: cleanText(row.serviceType) ?? 'benefit',
      data: {
        networkStatus: cleanText(row.networkStatus),
        coverageLevel: cleanText(row.coverageLevel),
        copay: parseAmount(row.copay),
        coinsurance: cleanText(row.coinsurance),
        authorizationRequired: /^(y|yes|true)$/i.test(row.authorizationRequired ?? ''),
        notes: cleanText(row.notes),
      },
    })),
  };
}
