import { Cat } from '../entities/cat.entity';

export interface CatDetail {
  id: number;
  name: string;
  breed: string | null;
  age: number | null;
  color: string | null;
  /** Two-decimal string, e.g. `"4.20"`. */
  weight: string | null;
  is_neutered: boolean;
  owner_name: string | null;
  adoption_date: string | null;
  description: string | null;
  created_at: string;
  is_adopted: boolean;
  age_display: string;
  weight_display: string;
  status_display: string;
}

export interface CatListItem {
  id: number;
  name: string;
  breed: string | null;
  age: number | null;
  color: string | null;
  is_adopted: boolean;
  status_display: string;
  created_at: string;
}

export interface CatStatistics {
  total_cats: number;
  adopted_cats: number;
  available_cats: number;
  adoption_rate: number;
  average_age: number | null;
  youngest_age: number | null;
  oldest_age: number | null;
  neutered_cats: number;
  breeds_count: number;
  recent_adoptions: number;
}

export interface BreedStatistics {
  breed: string;
  count: number;
  adoption_rate: number;
  average_age: number | null;
  average_weight: number | null;
}

export interface CatSearchResult {
  count: number;
  results: CatListItem[];
}

export function toCatDetail(cat: Cat): CatDetail {
  return {
    id: cat.id,
    name: cat.name,
    breed: cat.breed,
    age: cat.age,
    color: cat.color,
    weight: cat.weight === null ? null : cat.weight.toFixed(2),
    is_neutered: cat.isNeutered,
    owner_name: cat.ownerName,
    adoption_date: cat.adoptionDate,
    description: cat.description,
    created_at: cat.createdAt.toISOString(),
    is_adopted: cat.isAdopted,
    age_display: cat.ageDisplay,
    weight_display: cat.weightDisplay,
    status_display: cat.statusDisplay,
  };
}

export function toCatListItem(cat: Cat): CatListItem {
  return {
    id: cat.id,
    name: cat.name,
    breed: cat.breed,
    age: cat.age,
    color: cat.color,
    is_adopted: cat.isAdopted,
    status_display: cat.statusDisplay,
    created_at: cat.createdAt.toISOString(),
  };
}
