import { ValidationError } from '../common/errors';
import { NAME_MAX_LENGTH, SLUG_MAX_LENGTH } from '../database/entities/category.entity';

export const SLUG_PATTERN = /^[-a-zA-Z0-9_]+$/;

export function assertValidName(name: string): void {
  if (name.trim().length === 0 || name.length > NAME_MAX_LENGTH) {
    throw new ValidationError(
      `Name must be between 1 and ${NAME_MAX_LENGTH} characters`,
    );
  }
}

export function assertValidSlug(slug: string): void {
  if (slug.length === 0 || slug.length > SLUG_MAX_LENGTH || !SLUG_PATTERN.test(slug)) {
    throw new ValidationError(
      `Slug must be 1-${SLUG_MAX_LENGTH} characters of letters, digits, "-" or "_"`,
    );
  }
}

export function assertValidYear(year: number, now: Date = new Date()): void {
  const currentYear = now.getFullYear();
  if (!Number.isInteger(year) || year <= 0) {
    throw new ValidationError('Year must be a positive whole number');
  }
  if (year > currentYear) {
    throw new ValidationError(`${year} cannot be later than ${currentYear}`);
  }
}
