import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  ConflictError,
  InvalidFilterError,
  InvalidRequestError,
  NotFoundError,
  PersonStore,
  mergePerson
} from './PersonStore'
import { serialize, validateForCreate, validateForUpdate } from './PersonValidator'
import { createTestDatabase } from '../test/database'
import type { Database } from '../types/database'
import type { PersonAttributes, PersonCreationAttributes } from '../types/person'

const person = (overrides: Partial<PersonCreationAttributes> = {}): PersonCreationAttributes => ({
  nombre: 'Ana Garcia',
  apellido: 'Garcia',
  categoria: 'A',
  correo_electronico: 'ana@x.com',
  url: 'http://x.com',
  ...overrides,
})

describe('PersonStore', () => {
  let database: Database
  let store: PersonStore

  beforeEach(async () => {
    database = await createTestDatabase()
    store = new PersonStore(database)
  })

  afterEach(async () => {
    await database.sequelize.close()
  })

  describe('create', () => {
    it('assigns an id and defaults es_activo to true', async () => {
      const created = await store.create(validateForCreate(person()))

      expect(typeof created.id).toBe('number')
      expect(created.es_activo).toBe(true)

      const stored = await store.getById(created.id)
      expect(serialize(stored)).toEqual({
        id: created.id,
        nombre: 'Ana Garcia',
        apellido: 'Garcia',
        categoria: 'A',
        edad: null,
        correo_electronico: 'ana@x.com',
        url: 'http://x.com',
        fecha_nacimiento: null,
        es_activo: true,
      })
    })

    it('stores the optional fields', async () => {
      const created = await store.create(person({ edad: 34, fecha_nacimiento: '1990-05-01' }))
      const stored = await store.getById(created.id)

      expect(stored.edad).toBe(34)
      expect(stored.fecha_nacimiento).toBe('1990-05-01')
    })

    it('fails with ConflictError on a duplicate email and keeps the first record', async () => {
      const first = await store.create(person())

      await expect(store.create(person({ nombre: 'Marta' }))).rejects.toBeInstanceOf(ConflictError)
      await expect(store.create(person({ nombre: 'Marta' }))).rejects.toMatchObject({
        fields: ['correo_electronico'],
        statusCode: 409,
        message: 'Ya existe una persona con el mismo valor en: correo_electronico',
      })

      const stored = await store.getById(first.id)
      expect(stored.nombre).toBe('Ana Garcia')
      expect(await store.list()).toHaveLength(1)
    })
  })

  describe('getById', () => {
    it('fails with NotFoundError for a missing id', async () => {
      await expect(store.getById(999)).rejects.toBeInstanceOf(NotFoundError)
      await expect(store.getById(999)).rejects.toMatchObject({
        personId: 999,
        statusCode: 404,
        message: 'Persona no encontrada',
      })
    })
  })

  describe('list', () => {
    let ids: number[]

    beforeEach(async () => {
      const created = [
        await store.create(person({ correo_electronico: 'a@x.com', edad: 34, categoria: 'A' })),
        await store.create(person({ correo_electronico: 'b@x.com', edad: 20, categoria: 'B' })),
        await store.create(person({ correo_electronico: 'c@x.com', edad: 34, categoria: 'B' })),
      ]
      ids = created.map((entry) => entry.id)
    })

    it('returns every record ordered by id for an empty filter', async () => {
      const persons = await store.list({})
      expect(persons.map((entry) => entry.id)).toEqual(ids)
    })

    it('returns exactly the records matching an equality filter', async () => {
      const persons = await store.list({ edad: 34 })
      expect(persons.map((entry) => entry.correo_electronico)).toEqual(['a@x.com', 'c@x.com'])
    })

    it('combines several keys with AND', async () => {
      const persons = await store.list({ edad: 34, categoria: 'B' })
      expect(persons.map((entry) => entry.correo_electronico)).toEqual(['c@x.com'])
    })

    it('returns an empty list when nothing matches', async () => {
      expect(await store.list({ edad: 49 })).toEqual([])
    })

    it('filters on es_activo', async () => {
      expect(await store.list({ es_activo: true })).toHaveLength(3)
      expect(await store.list({ es_activo: false })).toHaveLength(0)
    })

    it('rejects unknown columns with InvalidFilterError', async () => {
      await expect(store.list({ color: 'azul' })).rejects.toBeInstanceOf(InvalidFilterError)
      await expect(store.list({ edad: 34, color: 'azul' })).rejects.toMatchObject({
        field: 'color',
        statusCode: 400,
        message: 'Campo de filtro desconocido: color',
      })
    })

    it('fails with InvalidRequestError when the datastore rejects the query', async () => {
      await database.models.Person.drop()

      await expect(store.list({ edad: 34 })).rejects.toBeInstanceOf(InvalidRequestError)
      await expect(store.list()).rejects.toMatchObject({
        statusCode: 400,
        reason: expect.stringContaining('no such table: personas'),
      })
    })
  })

  describe('update', () => {
    it('changes only the supplied fields', async () => {
      const created = await store.create(person({ edad: 30, fecha_nacimiento: '1994-03-12' }))
      const before = serialize(await store.getById(created.id))

      const updated = await store.update(created.id, validateForUpdate({ categoria: 'B' }))

      expect(serialize(updated)).toEqual({ ...before, categoria: 'B' })
      expect(serialize(await store.getById(created.id))).toEqual({ ...before, categoria: 'B' })
    })

    it('clears a nullable field set to null', async () => {
      const created = await store.create(person({ edad: 30 }))

      await store.update(created.id, { edad: null })

      expect((await store.getById(created.id)).edad).toBeNull()
    })

    it('fails with NotFoundError for a missing id without writing anything', async () => {
      await store.create(person())

      await expect(store.update(999, { categoria: 'C' })).rejects.toBeInstanceOf(NotFoundError)
      expect(await store.list({ categoria: 'C' })).toEqual([])
    })

    it('fails with ConflictError when taking another email', async () => {
      await store.create(person())
      const other = await store.create(person({ correo_electronico: 'luis@x.com' }))

      await expect(store.update(other.id, { correo_electronico: 'ana@x.com' })).rejects.toBeInstanceOf(ConflictError)
      expect((await store.getById(other.id)).correo_electronico).toBe('luis@x.com')
    })
  })

  describe('model validation', () => {
    it('turns a column validator failure into InvalidRequestError', async () => {
      // Typed callers cannot build an unknown category, so the payload comes untyped
      const data: PersonCreationAttributes = JSON.parse(JSON.stringify({ ...person(), categoria: 'Z' }))

      await expect(store.create(data)).rejects.toMatchObject({
        name: 'InvalidRequestError',
        statusCode: 400,
        reason: 'Validation error: Invalid category',
      })
      expect(await store.list()).toEqual([])
    })
  })

  describe('delete', () => {
    it('removes the record permanently', async () => {
      const created = await store.create(person())

      await store.delete(created.id)

      await expect(store.getById(created.id)).rejects.toBeInstanceOf(NotFoundError)
      expect(await store.list()).toEqual([])
    })

    it('reports NotFoundError on every attempt for a missing id', async () => {
      await expect(store.delete(404)).rejects.toBeInstanceOf(NotFoundError)
      await expect(store.delete(404)).rejects.toBeInstanceOf(NotFoundError)
    })
  })
})

describe('mergePerson', () => {
  const current: PersonAttributes = {
    id: 1,
    nombre: 'Ana Garcia',
    apellido: 'Garcia',
    categoria: 'A',
    edad: 30,
    correo_electronico: 'ana@x.com',
    url: 'http://x.com',
    fecha_nacimiento: '1994-03-12',
    es_activo: true,
  }

  it('keeps the stored value for absent keys', () => {
    expect(mergePerson(current, {})).toEqual(current)
  })

  it('overwrites supplied keys and clears nullable ones', () => {
    expect(mergePerson(current, { nombre: 'Luis', edad: null })).toEqual({
      ...current,
      nombre: 'Luis',
      edad: null,
    })
  })
})
