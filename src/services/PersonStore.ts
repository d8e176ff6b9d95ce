// src/services/PersonStore.ts

import {
  DatabaseError,
  UniqueConstraintError,
  ValidationError as ModelValidationError,
  type WhereAttributeHash
} from 'sequelize';
import type { Person } from '../models/Person';
import type { Database } from '../types/database';
import type {
  PersonAttributes,
  PersonCreationAttributes,
  PersonFilter,
  PersonUpdateData
} from '../types/person';

export const PERSON_NOT_FOUND_MESSAGE = 'Persona no encontrada';

/**
 * Overlays the supplied fields on the stored ones. A key that is absent (or
 * undefined) keeps the stored value; `null` clears a nullable field.
 */
export const mergePerson = (current: PersonAttributes, changes: PersonUpdateData): PersonAttributes => ({
  id: current.id,
  nombre: changes.nombre === undefined ? current.nombre : changes.nombre,
  apellido: changes.apellido === undefined ? current.apellido : changes.apellido,
  categoria: changes.categoria === undefined ? current.categoria : changes.categoria,
  edad: changes.edad === undefined ? current.edad : changes.edad,
  correo_electronico: changes.correo_electronico === undefined ? current.correo_electronico : changes.correo_electronico,
  url: changes.url === undefined ? current.url : changes.url,
  fecha_nacimiento: changes.fecha_nacimiento === undefined ? current.fecha_nacimiento : changes.fecha_nacimiento,
  es_activo: current.es_activo
});

export class PersonStore {
  private readonly model: typeof Person;

  constructor(database: Database) {
    this.model = database.models.Person;
  }

  async create(data: PersonCreationAttributes): Promise<Person> {
    try {
      return await this.model.create(data);
    } catch (error) {
      throw this.translateError(error);
    }
  }

  async getById(id: number): Promise<Person> {
    const person = await this.model.findByPk(id);
    if (!person) {
      throw new NotFoundError(id);
    }
    return person;
  }

  async list(filter: PersonFilter = {}): Promise<Person[]> {
    const fields = this.model.getFieldNames();
    const where: WhereAttributeHash = {};

    for (const [field, value] of Object.entries(filter)) {
      if (!fields.includes(field)) {
        throw new InvalidFilterError(field);
      }
      where[field] = value;
    }

    try {
      return await this.model.findAll({
        where,
        order: [['id', 'ASC']]
      });
    } catch (error) {
      throw this.translateError(error);
    }
  }

  async update(id: number, changes: PersonUpdateData): Promise<Person> {
    const person = await this.getById(id);

    person.set(mergePerson(person.get({ plain: true }), changes));

    try {
      return await person.save();
    } catch (error) {
      throw this.translateError(error);
    }
  }

  async delete(id: number): Promise<void> {
    const person = await this.getById(id);
    await person.destroy();
  }

  // UniqueConstraintError extends the model ValidationError, so it is checked first
  private translateError(error: unknown): unknown {
    if (error instanceof UniqueConstraintError) {
      const fields = error.errors
        .map((item) => item.path)
        .filter((path): path is string => Boolean(path));
      return new ConflictError(fields);
    }
    if (error instanceof ModelValidationError || error instanceof DatabaseError) {
      return new InvalidRequestError(error.message);
    }
    return error;
  }
}

// Custom error types
export class PersonStoreError extends Error {
  constructor(message: string, public readonly statusCode: number) {
    super(message);
    this.name = 'PersonStoreError';
  }
}

export class NotFoundError extends PersonStoreError {
  constructor(public readonly personId: number) {
    super(PERSON_NOT_FOUND_MESSAGE, 404);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends PersonStoreError {
  constructor(public readonly fields: string[]) {
    super(
      fields.length > 0
        ? `Ya existe una persona con el mismo valor en: ${fields.join(', ')}`
        : 'Ya existe una persona con los mismos datos',
      409
    );
    this.name = 'ConflictError';
  }
}

export class InvalidFilterError extends PersonStoreError {
  constructor(public readonly field: string) {
    super(`Campo de filtro desconocido: ${field}`, 400);
    this.name = 'InvalidFilterError';
  }
}

export class InvalidRequestError extends PersonStoreError {
  constructor(public readonly reason: string) {
    super('La base de datos rechazó la operación', 400);
    this.name = 'InvalidRequestError';
  }
}
