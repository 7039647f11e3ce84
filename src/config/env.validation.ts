import * as Joi from 'joi';

/**
 * Esquema de validación de variables de entorno.
 */
export const envValidationSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  PORT: Joi.number().default(3000),

  // Base de datos
  DATABASE_URL: Joi.string().required(),
  DB_SYNCHRONIZE: Joi.boolean().default(false),

  // JWT (el token lo emite el servicio de identidad)
  JWT_SECRET: Joi.string().min(16).required(),

  CORS_ORIGIN: Joi.string().default('http://localhost:3001'),

  // Numeración
  INVOICE_NUMBER_PREFIX: Joi.string().max(10).default('INV'),
  QUOTATION_NUMBER_PREFIX: Joi.string().max(10).default('QUO'),

  // Facturación recurrente
  RECURRING_SWEEP_ENABLED: Joi.boolean().default(true),
  DEFAULT_PAYMENT_TERM_DAYS: Joi.number().integer().min(0).default(30),

  LOG_LEVEL: Joi.string()
    .valid('error', 'warn', 'log', 'debug', 'verbose')
    .default('log'),
});
