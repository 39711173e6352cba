import { today } from '../../common/dates';
import { Cat } from '../entities/cat.entity';
import { AdoptionRequestError, StateConflictError } from '../errors/cat.errors';
import { checkName } from '../validation/cat.validation';

export type AdoptionState = 'available' | 'adopted';

export function adoptionState(cat: Cat): AdoptionState {
  return cat.isAdopted ? 'adopted' : 'available';
}

export interface AdoptionRequest {
  ownerName: string | null | undefined;
  adoptionDate?: string | null;
}

/**
 * Moves an available cat to adopted. The state is checked before the owner
 * name, so adopting an adopted cat always reports who has it. Nothing on
 * `cat` changes unless both checks pass.
 */
export function adopt(cat: Cat, request: AdoptionRequest): void {
  if (adoptionState(cat) === 'adopted') {
    throw new StateConflictError(
      'AlreadyAdopted',
      `${cat.name} has already been adopted by ${cat.ownerName}`,
    );
  }

  const ownerName = checkName(request.ownerName, 'Owner name');
  if (!ownerName.ok) {
    throw new AdoptionRequestError(ownerName.error.message, ownerName.error.code);
  }

  cat.markAdopted(ownerName.value, request.adoptionDate ?? today());
}

/**
 * Moves an adopted cat back to available and returns the former owner.
 */
export function returnToShelter(cat: Cat): string {
  if (adoptionState(cat) === 'available' || cat.ownerName === null) {
    throw new StateConflictError(
      'NotAdopted',
      `${cat.name} is not currently adopted`,
    );
  }

  const formerOwner = cat.ownerName;
  cat.markReturned();
  return formerOwner;
}
