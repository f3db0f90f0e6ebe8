import { randomBytes, randomUUID } from 'crypto';
import { compactDate } from './dates';

export const newId = (): string => randomUUID();

const suffix = (): string => randomBytes(4).toString('hex').toUpperCase();

export const generateQuoteNumber = (at: Date): string => `QT-${compactDate(at)}-${suffix()}`;
