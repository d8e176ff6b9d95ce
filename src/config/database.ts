// src/config/database.ts
import { Sequelize } from 'sequelize';
import { Person } from '../models/Person';
import type { AppConfig } from './env';
import type { Database, Models } from '../types/database';

export interface DatabaseOptions {
  databaseUrl: string;
  dialect: AppConfig['dialect'];
  logging?: boolean;
}

export const initializeDatabase = ({ databaseUrl, dialect, logging = false }: DatabaseOptions): Database => {
  const sequelize = new Sequelize(databaseUrl, {
    dialect,
    logging: logging ? console.log : false,
  });

  const models: Models = {
    Person: Person.initModel(sequelize),
  };

  return {
    sequelize,
    models
  };
};
