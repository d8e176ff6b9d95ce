// src/services/PersonValidator.ts

import { z } from 'zod';
import {
  personCreateSchema,
  personUpdateSchema,
  personFilterSchema,
  personErrorMap,
  type PersonInput,
  type PersonUpdateInput
} from '../types/person.schemas';
import type { PersonAttributes, PersonFilter, PersonJSON } from '../types/person';

export type FieldErrors = Record<string, string[]>;

// Key used for problems with the payload as a whole
export const SCHEMA_ERROR_KEY = '_schema';

export class ValidationError extends Error {
  public readonly statusCode = 400;

  constructor(public readonly messages: FieldErrors) {
    super('Validation failed');
    this.name = 'ValidationError';
  }
}

const addMessage = (errors: FieldErrors, field: string, message: string): void => {
  if (!errors[field]) {
    errors[field] = [];
  }
  errors[field].push(message);
};

/**
 * Groups every zod issue under the top-level field it belongs to. Unknown
 * keys are reported under their own name.
 */
export const collectFieldErrors = (error: z.ZodError): FieldErrors => {
  const errors: FieldErrors = {};

  for (const issue of error.issues) {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      issue.keys.forEach((key) => addMessage(errors, key, issue.message));
      continue;
    }

    const field = issue.path.length > 0 ? String(issue.path[0]) : SCHEMA_ERROR_KEY;
    addMessage(errors, field, issue.message);
  }

  return errors;
};

const parseWith = <Output>(schema: z.ZodType<Output, z.ZodTypeDef, unknown>, input: unknown): Output => {
  const result = schema.safeParse(input, { errorMap: personErrorMap });
  if (!result.success) {
    throw new ValidationError(collectFieldErrors(result.error));
  }
  return result.data;
};

export const validateForCreate = (input: unknown): PersonInput => parseWith(personCreateSchema, input);

// Only the keys present in the input come back; nothing is defaulted
export const validateForUpdate = (input: unknown): PersonUpdateInput => parseWith(personUpdateSchema, input);

export const parseFilter = (query: unknown): PersonFilter => parseWith(personFilterSchema, query);

export const serialize = (person: PersonAttributes): PersonJSON => ({
  id: person.id,
  nombre: person.nombre,
  apellido: person.apellido,
  categoria: person.categoria,
  edad: person.edad ?? null,
  correo_electronico: person.correo_electronico,
  url: person.url,
  fecha_nacimiento: person.fecha_nacimiento ?? null,
  es_activo: person.es_activo
});

export const serializeMany = (persons: PersonAttributes[]): PersonJSON[] => persons.map(serialize);
