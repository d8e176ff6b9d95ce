import { z } from 'zod';
import { PERSON_CATEGORIES } from './person';

export const NOMBRE_PATTERN = /^[A-Z][a-z]+(?: [A-Z][a-z]+)*$/;
export const MIN_AGE = 18;
export const MAX_AGE = 50;
export const MAX_TEXT_LENGTH = 120;

const INTEGER_PATTERN = /^-?\d+$/;

export const PERSON_MESSAGES = {
  required: 'Campo obligatorio.',
  unknownField: 'Campo desconocido.',
  invalidInput: 'Datos de entrada no válidos.',
  invalidString: 'No es una cadena válida.',
  invalidInteger: 'No es un entero válido.',
  invalidEmail: 'No es un correo electrónico válido.',
  invalidUrl: 'No es una URL válida.',
  invalidDate: 'No es una fecha válida.',
  tooLong: `No puede superar los ${MAX_TEXT_LENGTH} caracteres.`,
  nombreFormat: 'El nombre debe iniciar con mayúscula y contener solo letras.',
  nombreLength: 'El nombre debe tener al menos 3 caracteres.',
  edadMin: 'Debe ser mayor de edad.',
  edadMax: `La edad no puede ser mayor de ${MAX_AGE} años.`,
  futureDate: 'La fecha de nacimiento no puede ser futura.',
  singleValue: 'Se esperaba un único valor.'
} as const;

// Local calendar date as YYYY-MM-DD
export const currentDate = (now: Date = new Date()): string => {
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `${now.getFullYear()}-${month}-${day}`;
};

/**
 * Messages for the generic issues zod raises. Check-specific messages are set
 * on the checks themselves and take precedence.
 */
export const personErrorMap: z.ZodErrorMap = (issue, ctx) => {
  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      if (issue.received === z.ZodParsedType.undefined) {
        return { message: PERSON_MESSAGES.required };
      }
      if (issue.received === z.ZodParsedType.array && issue.expected !== z.ZodParsedType.object) {
        return { message: PERSON_MESSAGES.singleValue };
      }
      if (issue.expected === z.ZodParsedType.string) {
        return { message: PERSON_MESSAGES.invalidString };
      }
      if (issue.expected === z.ZodParsedType.number || issue.expected === z.ZodParsedType.integer) {
        return { message: PERSON_MESSAGES.invalidInteger };
      }
      if (issue.expected === z.ZodParsedType.object) {
        return { message: PERSON_MESSAGES.invalidInput };
      }
      return { message: ctx.defaultError };
    case z.ZodIssueCode.invalid_string:
      if (issue.validation === 'email') return { message: PERSON_MESSAGES.invalidEmail };
      if (issue.validation === 'url') return { message: PERSON_MESSAGES.invalidUrl };
      if (issue.validation === 'date') return { message: PERSON_MESSAGES.invalidDate };
      return { message: ctx.defaultError };
    case z.ZodIssueCode.invalid_enum_value:
      return { message: `Debe ser uno de: ${issue.options.join(', ')}.` };
    case z.ZodIssueCode.unrecognized_keys:
      return { message: PERSON_MESSAGES.unknownField };
    default:
      return { message: ctx.defaultError };
  }
};

// "today" is read on every parse, not once at load time
const fechaNacimientoSchema = z.string()
  .date()
  .pipe(z.string().refine((value) => value <= currentDate(), PERSON_MESSAGES.futureDate));

const WEB_URL_PROTOCOLS = ['http:', 'https:', 'ftp:', 'ftps:'];

// Runs after .url(), so the value always parses
const isWebUrl = (value: string): boolean => {
  const { protocol, hostname } = new URL(value);
  return WEB_URL_PROTOCOLS.includes(protocol) && hostname.length > 0;
};

// Bodies may carry the age as an integer string, e.g. "34"
const toInteger = (value: unknown): unknown =>
  typeof value === 'string' && INTEGER_PATTERN.test(value) ? Number(value) : value;

const text = () => z.string().max(MAX_TEXT_LENGTH, PERSON_MESSAGES.tooLong);

const personFields = {
  nombre: text()
    .regex(NOMBRE_PATTERN, PERSON_MESSAGES.nombreFormat)
    .min(3, PERSON_MESSAGES.nombreLength),
  apellido: text(),
  categoria: z.enum(PERSON_CATEGORIES),
  edad: z.preprocess(toInteger, z.number()
    .int()
    .min(MIN_AGE, PERSON_MESSAGES.edadMin)
    .max(MAX_AGE, PERSON_MESSAGES.edadMax))
    .nullable()
    .optional(),
  correo_electronico: text().email(),
  url: text()
    .url()
    .pipe(z.string().refine(isWebUrl, PERSON_MESSAGES.invalidUrl)),
  fecha_nacimiento: fechaNacimientoSchema.nullable().optional()
};

export const personCreateSchema = z.object(personFields).strict();

export const personUpdateSchema = personCreateSchema.partial();

const queryInteger = z.string()
  .regex(INTEGER_PATTERN, PERSON_MESSAGES.invalidInteger)
  .transform(Number);

// Query strings only carry text; known columns are coerced, the rest pass through
export const personFilterSchema = z.object({
  id: queryInteger,
  nombre: z.string(),
  apellido: z.string(),
  categoria: z.string(),
  edad: queryInteger,
  correo_electronico: z.string(),
  url: z.string(),
  fecha_nacimiento: z.string(),
  es_activo: z.enum(['true', 'false'])
    .transform((value) => value === 'true')
}).partial().passthrough();

export type PersonInput = z.infer<typeof personCreateSchema>;
export type PersonUpdateInput = z.infer<typeof personUpdateSchema>;
