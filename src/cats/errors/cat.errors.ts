export type CatErrorCode =
  | 'EmptyField'
  | 'TooShort'
  | 'DuplicateName'
  | 'NegativeValue'
  | 'OutOfRange'
  | 'NonPositive'
  | 'TooPrecise'
  | 'AdoptionInconsistent'
  | 'AlreadyAdopted'
  | 'NotAdopted';

export interface FieldError {
  code: CatErrorCode;
  message: string;
}

/** Field name (or `non_field_errors`) to every problem found on it. */
export type ValidationErrors = Record<string, FieldError[]>;

export const NON_FIELD_ERRORS = 'non_field_errors';

export abstract class CatsError extends Error {
  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class CatValidationError extends CatsError {
  constructor(readonly errors: ValidationErrors) {
    super('Invalid data provided');
  }

  /** Messages per field, as sent to clients. */
  messages(): Record<string, string[]> {
    return Object.fromEntries(
      Object.entries(this.errors).map(([field, errors]) => [
        field,
        errors.map((error) => error.message),
      ]),
    );
  }
}

/**
 * Raised by the entity itself when a write would leave exactly one of
 * `owner_name` and `adoption_date` set.
 */
export class AdoptionConsistencyError extends CatValidationError {
  constructor(message: string) {
    super({ [NON_FIELD_ERRORS]: [{ code: 'AdoptionInconsistent', message }] });
  }
}

export class StateConflictError extends CatsError {
  constructor(
    readonly code: Extract<CatErrorCode, 'AlreadyAdopted' | 'NotAdopted'>,
    message: string,
  ) {
    super(message);
  }
}

/**
 * A rejected adoption request body, such as a missing or one-letter owner
 * name. Reported to clients as a single message.
 */
export class AdoptionRequestError extends CatsError {
  constructor(
    message: string,
    readonly code: CatErrorCode | null = null,
  ) {
    super(message);
  }
}

export class CatNotFoundError extends CatsError {
  constructor(readonly id: number | string) {
    super(`Cat with ID ${id} not found`);
  }
}

/** A persistence failure. `message` is safe to show, `cause` is not. */
export class StoreError extends CatsError {
  constructor(
    message: string,
    readonly cause: unknown,
  ) {
    super(message);
  }
}
