import type { Sequelize } from 'sequelize';
import type { Person } from '../models/Person';

export interface Models {
  Person: typeof Person;
}

export interface Database {
  sequelize: Sequelize;
  models: Models;
}
