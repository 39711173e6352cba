import {
  CatErrorCode,
  FieldError,
  NON_FIELD_ERRORS,
  ValidationErrors,
} from '../errors/cat.errors';
import { blankToNull, toTitleCase } from './text';

export const MIN_TEXT_LENGTH = 2;
export const MIN_DESCRIPTION_LENGTH = 10;
export const MAX_AGE = 30;
export const MAX_WEIGHT = 20;

/** Every stored, writable column of a cat, already normalized. */
export interface CatFields {
  name: string;
  breed: string | null;
  age: number | null;
  color: string | null;
  weight: number | null;
  isNeutered: boolean;
  ownerName: string | null;
  adoptionDate: string | null;
  description: string | null;
}

/**
 * Fields a client asked to write. `undefined` means "not sent" and keeps the
 * existing value; `null` clears it.
 */
export type CatCandidate = {
  [K in keyof CatFields]?: CatFields[K] | null;
};

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: ValidationErrors };

export type Check<T> = { ok: true; value: T } | { ok: false; error: FieldError };

export interface NameLookup {
  nameExists(name: string): Promise<boolean>;
}

const pass = <T>(value: T): Check<T> => ({ ok: true, value });
const fail = <T>(code: CatErrorCode, message: string): Check<T> => ({
  ok: false,
  error: { code, message },
});

/**
 * Required personal name (cat or owner). `label` starts the messages, e.g.
 * "Cat name" or "Owner name".
 */
export function checkName(
  value: string | null | undefined,
  label: string,
): Check<string> {
  const trimmed = blankToNull(value);
  if (trimmed === null) {
    return fail('EmptyField', `${label} cannot be empty`);
  }
  if (trimmed.length < MIN_TEXT_LENGTH) {
    return fail(
      'TooShort',
      `${label} must be at least ${MIN_TEXT_LENGTH} characters long`,
    );
  }
  return pass(toTitleCase(trimmed));
}

/** Optional short text stored in title case; blank counts as absent. */
export function checkOptionalText(
  value: string | null | undefined,
  label: string,
): Check<string | null> {
  const trimmed = blankToNull(value);
  if (trimmed === null) {
    return pass(null);
  }
  if (trimmed.length < MIN_TEXT_LENGTH) {
    return fail(
      'TooShort',
      `${label} must be at least ${MIN_TEXT_LENGTH} characters long`,
    );
  }
  return pass(toTitleCase(trimmed));
}

export function checkAge(value: number | null | undefined): Check<number | null> {
  if (value === null || value === undefined) {
    return pass(null);
  }
  if (value < 0) {
    return fail('NegativeValue', 'Age cannot be negative');
  }
  if (value > MAX_AGE) {
    return fail('OutOfRange', 'Age seems unrealistic for a cat');
  }
  return pass(value);
}

export function checkWeight(
  value: number | null | undefined,
): Check<number | null> {
  if (value === null || value === undefined) {
    return pass(null);
  }
  if (value <= 0) {
    return fail('NonPositive', 'Weight must be positive');
  }
  if (value > MAX_WEIGHT) {
    return fail('OutOfRange', 'Weight seems unrealistic for a cat');
  }
  if (Math.round(value * 100) / 100 !== value) {
    return fail(
      'TooPrecise',
      'Ensure that there are no more than 2 decimal places.',
    );
  }
  return pass(value);
}

export function checkDescription(
  value: string | null | undefined,
): Check<string | null> {
  const trimmed = blankToNull(value);
  if (trimmed !== null && trimmed.length < MIN_DESCRIPTION_LENGTH) {
    return fail(
      'TooShort',
      `Description must be at least ${MIN_DESCRIPTION_LENGTH} characters long`,
    );
  }
  return pass(trimmed);
}

/** The both-or-neither rule for `owner_name` and `adoption_date`. */
export function checkAdoptionConsistency(
  ownerName: string | null,
  adoptionDate: string | null,
): FieldError | null {
  if (adoptionDate !== null && ownerName === null) {
    return {
      code: 'AdoptionInconsistent',
      message: 'Adopted cats must have an owner name',
    };
  }
  if (ownerName !== null && adoptionDate === null) {
    return {
      code: 'AdoptionInconsistent',
      message: 'Cats with owners must have an adoption date',
    };
  }
  return null;
}

export function pickCatFields(source: CatFields): CatFields {
  return {
    name: source.name,
    breed: source.breed,
    age: source.age,
    color: source.color,
    weight: source.weight,
    isNeutered: source.isNeutered,
    ownerName: source.ownerName,
    adoptionDate: source.adoptionDate,
    description: source.description,
  };
}

const NEW_CAT: CatFields = {
  name: '',
  breed: null,
  age: null,
  color: null,
  weight: null,
  isNeutered: false,
  ownerName: null,
  adoptionDate: null,
  description: null,
};

/**
 * Validates and normalizes a write. With no `existing` record this is a
 * create: the name is required and must not match another cat's name
 * ignoring case. Otherwise fields left `undefined` keep their stored value.
 *
 * Field errors are collected together. The adoption pair is only checked
 * once every field is valid, against the record as it would be stored.
 */
export async function validateCat(
  candidate: CatCandidate,
  existing: CatFields | null,
  lookup: NameLookup,
): Promise<ValidationResult<CatFields>> {
  const creating = existing === null;
  const value = pickCatFields(existing ?? NEW_CAT);
  const errors: ValidationErrors = {};

  const apply = <K extends keyof CatFields>(
    key: K,
    field: string,
    check: Check<CatFields[K]>,
  ) => {
    if (check.ok) {
      value[key] = check.value;
    } else {
      (errors[field] ??= []).push(check.error);
    }
  };

  if (creating || candidate.name !== undefined) {
    const name = checkName(candidate.name, 'Cat name');
    if (name.ok && creating && (await lookup.nameExists(name.value))) {
      apply(
        'name',
        'name',
        fail(
          'DuplicateName',
          `A cat with the name '${name.value}' already exists. Please choose a different name.`,
        ),
      );
    } else {
      apply('name', 'name', name);
    }
  }
  if (candidate.breed !== undefined) {
    apply('breed', 'breed', checkOptionalText(candidate.breed, 'Breed name'));
  }
  if (candidate.age !== undefined) {
    apply('age', 'age', checkAge(candidate.age));
  }
  if (candidate.color !== undefined) {
    apply(
      'color',
      'color',
      checkOptionalText(candidate.color, 'Color description'),
    );
  }
  if (candidate.weight !== undefined) {
    apply('weight', 'weight', checkWeight(candidate.weight));
  }
  if (candidate.isNeutered !== undefined) {
    value.isNeutered = candidate.isNeutered ?? false;
  }
  if (candidate.ownerName !== undefined) {
    apply(
      'ownerName',
      'owner_name',
      checkOptionalText(candidate.ownerName, 'Owner name'),
    );
  }
  if (candidate.adoptionDate !== undefined) {
    value.adoptionDate = candidate.adoptionDate;
  }
  if (candidate.description !== undefined) {
    apply('description', 'description', checkDescription(candidate.description));
  }

  if (Object.keys(errors).length > 0) {
    return { ok: false, errors };
  }

  const inconsistency = checkAdoptionConsistency(
    value.ownerName,
    value.adoptionDate,
  );
  if (inconsistency) {
    return { ok: false, errors: { [NON_FIELD_ERRORS]: [inconsistency] } };
  }

  return { ok: true, value };
}
