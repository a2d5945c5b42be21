import 'dotenv/config';

interface DatabaseConfig {
  url: string;
  ssl: boolean;
}

interface JwtConfig {
  secret: string;
  expiresIn: string;
}

interface AuthConfig {
  bcryptRounds: number;
}

interface OwnerSeedConfig {
  username: string;
  email: string;
  password: string;
  fullName: string;
}

interface Config {
  port: number;
  nodeEnv: string;
  database: DatabaseConfig;
  jwt: JwtConfig;
  auth: AuthConfig;
  ownerSeed: OwnerSeedConfig | null;
}

const REQUIRED_VARIABLES = ['DATABASE_URL', 'JWT_SECRET'] as const;

type RequiredVariable = (typeof REQUIRED_VARIABLES)[number];

/** Validates that all required environment variables are set */
function loadRequired(): Record<RequiredVariable, string> {
  const missing = REQUIRED_VARIABLES.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missing.join(', ')}`
    );
  }

  return {
    DATABASE_URL: process.env.DATABASE_URL ?? '',
    JWT_SECRET: process.env.JWT_SECRET ?? '',
  };
}

/** Owner bootstrap account, only when every OWNER_* credential is present */
function loadOwnerSeed(): OwnerSeedConfig | null {
  const { OWNER_USERNAME, OWNER_EMAIL, OWNER_PASSWORD } = process.env;
  if (!OWNER_USERNAME || !OWNER_EMAIL || !OWNER_PASSWORD) {
    return null;
  }
  return {
    username: OWNER_USERNAME,
    email: OWNER_EMAIL,
    password: OWNER_PASSWORD,
    fullName: process.env.OWNER_FULL_NAME || 'Workshop Owner',
  };
}

const required = loadRequired();

/** Application configuration loaded from environment variables */
export const config: Config = {
  port: Number(process.env.PORT) || 3000,
  nodeEnv: process.env.NODE_ENV || 'development',
  database: {
    url: required.DATABASE_URL,
    ssl: process.env.DATABASE_SSL === 'true',
  },
  jwt: {
    secret: required.JWT_SECRET,
    expiresIn: process.env.JWT_EXPIRES_IN || '24h',
  },
  auth: {
    bcryptRounds: Number(process.env.BCRYPT_ROUNDS) || 10,
  },
  ownerSeed: loadOwnerSeed(),
};
