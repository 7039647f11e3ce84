// src/billing/dto/line-item.dto.ts
import {
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';

/**
 * Línea de documento (factura, cotización o plantilla recurrente).
 * Los importes derivados (lineTotal, taxAmount) los calcula siempre el backend.
 */
export class LineItemDto {
  /** Producto del catálogo (informativo) */
  @IsOptional()
  @IsInt()
  productId?: number;

  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  description!: string;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  quantity!: number;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  unitPrice!: number;

  /** % de impuesto entero, 0–100 */
  @IsInt()
  @Min(0)
  @Max(100)
  taxRate!: number;
}
