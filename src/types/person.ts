// src/types/person.ts

export const PERSON_CATEGORIES = ['A', 'B', 'C', 'D', 'E', 'F'] as const;
export type PersonCategory = typeof PERSON_CATEGORIES[number];

export interface PersonAttributes {
  id: number;
  nombre: string;
  apellido: string;
  categoria: PersonCategory;
  edad: number | null;
  correo_electronico: string;
  url: string;
  fecha_nacimiento: string | null;
  es_activo: boolean;
}

export interface PersonCreationAttributes extends Omit<PersonAttributes, 'id' | 'edad' | 'fecha_nacimiento' | 'es_activo'> {
  edad?: number | null;
  fecha_nacimiento?: string | null;
  es_activo?: boolean;
}

export interface PersonUpdateData extends Partial<Omit<PersonAttributes, 'id' | 'es_activo'>> {}

// Equality filter: column name -> exact value
export type PersonFilter = Record<string, unknown>;

// Shape returned by the API
export interface PersonJSON {
  id: number;
  nombre: string;
  apellido: string;
  categoria: PersonCategory;
  edad: number | null;
  correo_electronico: string;
  url: string;
  fecha_nacimiento: string | null;
  es_activo: boolean;
}
