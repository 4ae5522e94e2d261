import { z } from 'zod';
import type { ExtractedPage, PortalResult } from '../types.js';
import { cleanText, isoDate, keyPart, npi, optionalText, parseAmount, requiredText } from './common.js';

export const ClaimStatusSchema = z
  .object({
    payerName: requiredText,
    payerClaimId: optionalText,
    providerClaimId: optionalText,
    memberId: optionalText,
    patientLastName: optionalText,
    patientFirstName: optionalText,
    patientDob: isoDate.optional(),
    subscriberSameAsPatient: z.boolean().default(true),
    subscriberLastName: optionalText,
    subscriberFirstName: optionalText,
    providerNpi: npi.optional(),
    dosFrom: isoDate,
    dosTo: isoDate.optional(),
    claimAmount: z.number().nonnegative().optional(),
  })
  .refine((data) => Boolean(data.payerClaimId || data.providerClaimId || data.memberId), {
    message: 'One of payerClaimId, providerClaimId or memberId is required',
    path: ['payerClaimId'],
  })
  .refine((data) => data.subscriberSameAsPatient || Boolean(data.subscriberLastName), {
    message: 'subscriberLastName is required when the subscriber is not the patient',
    path: ['subscriberLastName'],
  })
  .refine((data) => !data.dosTo || data.dosTo >= data.dosFrom, {
    message: 'dosTo must not be before dosFrom',
    path: ['dosTo'],
  });

export type ClaimStatusData = z.infer<typeof ClaimStatusSchema>;

export function claimStatusKey(data: ClaimStatusData): string {
  const claimRef = data.payerClaimId ?? data.providerClaimId ?? `member-${keyPart(data.memberId)}`;
  return ['claim_status', keyPart(data.payerName), keyPart(claimRef), data.dosFrom].join(':');
}

export function summarizeClaimStatus(page: ExtractedPage): PortalResult {
  const { billedAmount, paidAmount, ...textFields } = page.fields;
  const result: Record<string, unknown> = {};
  for (const [name, text] of Object.entries(textFields)) {
    result[name] = cleanText(text);
  }
  result.billedAmount = parseAmount(billedAmount);
  result.paidAmount = parseAmount(paidAmount);

  return {
    result,
    lines: page.rows.map((row) => ({
      category: 'reason_code',
      data: {
        code: cleanText(row.code),
        description: cleanText(row.description),
      },
    })),
  };
}
