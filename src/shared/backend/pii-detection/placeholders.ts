import type { PiiCategory } from './types';

export const PII_CATEGORY_TO_PLACEHOLDER: Readonly<Record<PiiCategory, string>> = Object.freeze({
    email: '[EMAIL MASKED]',
    phone: '[PHONE MASKED]',
    credit_card: '[CREDIT CARD MASKED]',
    ssn: '[SSN MASKED]',
});
