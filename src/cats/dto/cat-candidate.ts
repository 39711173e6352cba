import { CatCandidate } from '../validation/cat.validation';
import { CreateCatDto } from './create-cat.dto';
import { UpdateCatDto } from './update-cat.dto';

/** Maps the snake_case wire body onto the fields `validateCat` takes. */
export function toCatCandidate(dto: CreateCatDto | UpdateCatDto): CatCandidate {
  return {
    name: dto.name,
    breed: dto.breed,
    age: dto.age,
    color: dto.color,
    weight: dto.weight,
    isNeutered: dto.is_neutered,
    ownerName: dto.owner_name,
    adoptionDate: dto.adoption_date,
    description: dto.description,
  };
}
