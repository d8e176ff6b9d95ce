import { Model, DataTypes, Sequelize } from 'sequelize';
import {
  PersonAttributes,
  PersonCreationAttributes,
  PersonCategory,
  PERSON_CATEGORIES
} from '../types/person';
import { MAX_TEXT_LENGTH } from '../types/person.schemas';

export class Person extends Model<PersonAttributes, PersonCreationAttributes> {
  declare id: number;
  declare nombre: string;
  declare apellido: string;
  declare categoria: PersonCategory;
  declare edad: number | null;
  declare correo_electronico: string;
  declare url: string;
  declare fecha_nacimiento: string | null;
  declare es_activo: boolean;

  static getFieldNames(): string[] {
    return Object.keys(Person.getAttributes());
  }

  static initModel(sequelize: Sequelize): typeof Person {
    Person.init({
      id: {
        type: DataTypes.INTEGER,
        autoIncrement: true,
        primaryKey: true,
      },
      nombre: {
        type: DataTypes.STRING(MAX_TEXT_LENGTH),
        allowNull: false,
      },
      apellido: {
        type: DataTypes.STRING(MAX_TEXT_LENGTH),
        allowNull: false,
      },
      categoria: {
        type: DataTypes.STRING(MAX_TEXT_LENGTH),
        allowNull: false,
        validate: {
          isIn: {
            args: [[...PERSON_CATEGORIES]],
            msg: 'Invalid category'
          }
        }
      },
      edad: {
        type: DataTypes.INTEGER,
        allowNull: true,
      },
      correo_electronico: {
        type: DataTypes.STRING(MAX_TEXT_LENGTH),
        allowNull: false,
        unique: true,
      },
      url: {
        type: DataTypes.STRING(MAX_TEXT_LENGTH),
        allowNull: false,
      },
      fecha_nacimiento: {
        type: DataTypes.DATEONLY,
        allowNull: true,
      },
      es_activo: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: true,
      },
    }, {
      sequelize,
      tableName: 'personas',
      timestamps: false,
    });

    return Person;
  }
}
