import {
  BeforeInsert,
  BeforeUpdate,
  Column,
  CreateDateColumn,
  Entity,
  PrimaryGeneratedColumn,
  ValueTransformer,
} from 'typeorm';
import { AdoptionConsistencyError } from '../errors/cat.errors';
import { checkAdoptionConsistency } from '../validation/cat.validation';

/** PostgreSQL hands decimals back as strings, SQLite as numbers. */
const decimalTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) => (value === null ? null : Number(value)),
};

@Entity({ name: 'cats' })
export class Cat {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'varchar', length: 100, nullable: true })
  breed!: string | null;

  @Column({ type: 'int', nullable: true })
  age!: number | null;

  @Column({ type: 'varchar', length: 50, nullable: true })
  color!: string | null;

  @Column({
    type: 'decimal',
    precision: 4,
    scale: 2,
    nullable: true,
    transformer: decimalTransformer,
  })
  weight!: number | null;

  @Column({ name: 'is_neutered', type: 'boolean', default: false })
  isNeutered!: boolean;

  @Column({ name: 'owner_name', type: 'varchar', length: 100, nullable: true })
  ownerName!: string | null;

  /** ISO calendar date, `YYYY-MM-DD`. */
  @Column({ name: 'adoption_date', type: 'date', nullable: true })
  adoptionDate!: string | null;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @CreateDateColumn({ name: 'created_at', update: false })
  createdAt!: Date;

  get isAdopted(): boolean {
    return this.adoptionDate !== null;
  }

  get ageDisplay(): string {
    if (this.age === null) {
      return 'Age unknown';
    }
    return this.age === 1 ? '1 year old' : `${this.age} years old`;
  }

  get weightDisplay(): string {
    return this.weight === null ? 'Weight unknown' : `${this.weight.toFixed(2)} kg`;
  }

  get statusDisplay(): string {
    return this.isAdopted ? `Adopted by ${this.ownerName}` : 'Available for adoption';
  }

  /** Sets the adoption pair together. */
  markAdopted(ownerName: string, adoptionDate: string): void {
    this.ownerName = ownerName;
    this.adoptionDate = adoptionDate;
  }

  /** Clears the adoption pair together. */
  markReturned(): void {
    this.ownerName = null;
    this.adoptionDate = null;
  }

  @BeforeInsert()
  @BeforeUpdate()
  assertAdoptionConsistency(): void {
    const error = checkAdoptionConsistency(
      this.ownerName ?? null,
      this.adoptionDate ?? null,
    );
    if (error) {
      throw new AdoptionConsistencyError(error.message);
    }
  }

  toString(): string {
    return `${this.name} (${this.breed ?? 'Mixed breed'})`;
  }
}
