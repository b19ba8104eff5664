import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

// Environment variables schema
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_DIR: z.string().optional(),

  // Signature detection
  SIGNATURE_THRESHOLD: z.string().default('0.9'),
  SIGNATURE_SHORT_LINE_MAX_WORDS: z.string().default('6'),
  SIGNATURE_LONG_LINE_MIN_WORDS: z.string().default('8'),

  // POS tagging
  POS_TAGGER_MODEL: z.string().default('compromise'),

  // Output
  CLEAN_OUTPUT_SUFFIX: z.string().default('_clean'),
});

// Parse and validate environment variables
const env = envSchema.parse(process.env);

// Export typed configuration
export const config = {
  env: env.NODE_ENV,
  logLevel: env.LOG_LEVEL,
  logDir: env.LOG_DIR,

  signature: {
    threshold: parseFloat(env.SIGNATURE_THRESHOLD),
    shortLineMaxWords: parseInt(env.SIGNATURE_SHORT_LINE_MAX_WORDS, 10),
    longLineMinWords: parseInt(env.SIGNATURE_LONG_LINE_MIN_WORDS, 10),
  },

  tagger: {
    model: env.POS_TAGGER_MODEL,
  },

  output: {
    suffix: env.CLEAN_OUTPUT_SUFFIX,
  },
};

export default config;
