import { ValidateIf } from 'class-validator';

/**
 * Campo que se puede omitir pero no anular: solo se salta la validación si no viene.
 * Para columnas NOT NULL (a diferencia de @IsOptional, que también deja pasar null).
 */
export function IsOmittable(): PropertyDecorator {
  return ValidateIf((_, value: unknown) => value !== undefined);
}
