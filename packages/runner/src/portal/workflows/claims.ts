import { z } from 'zod';
import type { ExtractedPage, PortalResult } from '../types.js';
import { cleanText, isoDate, keyPart, npi, optionalText, parseAmount, requiredText } from './common.js';

const stateCode = z
  .string()
  .trim()
  .regex(/^[A-Za-z]{2}$/, 'Expected a two-letter state code')
  .transform((value) => value.toUpperCase());

const zipCode = z
  .string()
  .trim()
  .regex(/^\d{5}(-?\d{4})?$/, 'Expected a 5 or 9 digit ZIP code');

export const ServiceLineSchema = z
  .object({
    fromDate: isoDate,
    toDate: isoDate.optional(),
    placeOfServiceCode: optionalText,
    procedureCode: requiredText,
    modifier: optionalText,
    /** Which diagnosis on the claim this line points at (1-12). */
    diagnosisPointer: z.number().int().min(1).max(12).default(1),
    amount: z.number().positive('Line amount must be greater than zero'),
    quantity: z.number().positive().default(1),
    quantityTypeCode: z.enum(['UN', 'MJ']).default('UN'),
  })
  .refine((line) => !line.toDate || line.toDate >= line.fromDate, {
    message: 'toDate must not be before fromDate',
    path: ['toDate'],
  });

export const ClaimsSchema = z.object({
  transactionType: z.enum(['Professional Claim', 'Institutional Claim']).default('Professional Claim'),
  payerName: requiredText,
  responsibilitySequence: z.enum(['Primary', 'Secondary', 'Tertiary']).default('Primary'),
  patientLastName: requiredText,
  patientFirstName: requiredText,
  patientBirthDate: isoDate,
  patientGenderCode: z.enum(['F', 'M', 'U']).optional(),
  patientRelationship: z.enum(['Self', 'Spouse', 'Child', 'Other']).default('Self'),
  subscriberMemberId: z.string().trim().min(1, 'Required').max(80),
  subscriberGroupNumber: optionalText,
  patientAddressLine1: optionalText,
  patientCity: optionalText,
  patientStateCode: stateCode.optional(),
  patientZipCode: zipCode.optional(),
  patientPaidAmount: z.number().nonnegative().optional(),
  /** Provider's own claim reference (patient account number). */
  claimControlNumber: optionalText,
  placeOfServiceCode: optionalText,
  frequencyTypeCode: optionalText,
  medicalRecordNumber: optionalText,
  billingProviderName: requiredText,
  billingProviderNpi: npi,
  billingProviderTaxId: z
    .string()
    .trim()
    .regex(/^\d{9}$/, 'Tax id must be exactly 9 digits'),
  billingProviderAddressLine1: optionalText,
  billingProviderCity: optionalText,
  billingProviderStateCode: stateCode.optional(),
  billingProviderZipCode: zipCode.optional(),
  diagnosisCode: requiredText,
  serviceLines: z
    .array(ServiceLineSchema)
    .min(1, 'At least one service line is required')
    .max(50, 'At most 50 service lines per claim'),
});

export type ClaimsData = z.infer<typeof ClaimsSchema>;
export type ServiceLineData = z.infer<typeof ServiceLineSchema>;

/** Sum of the line charges, rounded to cents. */
export function totalCharge(lines: readonly ServiceLineData[]): number {
  const cents = lines.reduce((sum, line) => sum + Math.round(line.amount * 100), 0);
  return cents / 100;
}

export function claimsKey(data: ClaimsData): string {
  const firstServiceDate = data.serviceLines.map((line) => line.fromDate).sort()[0] ?? '';
  return [
    'claims',
    keyPart(data.payerName),
    keyPart(data.subscriberMemberId),
    keyPart(data.claimControlNumber),
    firstServiceDate,
    totalCharge(data.serviceLines).toFixed(2),
  ].join(':');
}

/**
 * The portal's submission confirmation. Lines echo each submitted service
 * line with the status the portal shows for it.
 */
export function summarizeClaims(page: ExtractedPage, data: ClaimsData): PortalResult {
  return {
    result: {
      submissionStatus: cleanText(page.fields.submissionStatus),
      claimId: cleanText(page.fields.claimId),
      totalCharge: parseAmount(page.fields.totalCharge) ?? totalCharge(data.serviceLines),
      serviceLineCount: data.serviceLines.length,
    },
    lines: data.serviceLines.map((line, index) => ({
      category: 'service_line',
      data: {
        procedureCode: line.procedureCode,
        fromDate: line.fromDate,
        toDate: line.toDate ?? null,
        amount: line.amount,
        quantity: line.quantity,
        status: cleanText(page.rows[index]?.status),
      },
    })),
  };
}
