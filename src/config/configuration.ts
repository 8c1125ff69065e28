const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

/**
 * Express `trust proxy` setting: a boolean, a hop count, or a list of trusted
 * addresses and subnets.
 */
const toTrustProxy = (value: string | undefined): boolean | number | string => {
  if (!value || value === 'false') {
    return false;
  }
  if (value === 'true') {
    return true;
  }
  return /^\d+$/.test(value) ? parseInt(value, 10) : value;
};

const configuration = () => ({
  port: toInt(process.env.PORT, 5000),
  nodeEnv: process.env.NODE_ENV || 'development',
  http: {
    trustProxy: toTrustProxy(process.env.TRUST_PROXY),
  },
  database: {
    host: process.env.DATABASE_HOST || 'localhost',
    port: toInt(process.env.DATABASE_PORT, 5432),
    username: process.env.DATABASE_USERNAME || 'postgres',
    password: process.env.DATABASE_PASSWORD || 'postgres',
    database: process.env.DATABASE_NAME || 'jewelify',
    poolSize: toInt(process.env.DATABASE_POOL_SIZE, 10),
    connectionTimeoutMillis: toInt(process.env.DATABASE_TIMEOUT, 5000),
    runMigrations: process.env.DATABASE_RUN_MIGRATIONS === 'true',
  },
  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: toInt(process.env.REDIS_PORT, 6379),
    password: process.env.REDIS_PASSWORD,
  },
  twilio: {
    accountSid: process.env.TWILIO_ACCOUNT_SID,
    authToken: process.env.TWILIO_AUTH_TOKEN,
    phoneNumber: process.env.TWILIO_PHONE_NUMBER,
  },
  sms: {
    sandbox: process.env.SMS_SANDBOX === 'true',
  },
  metrics: {
    allowedIps: process.env.METRICS_ALLOWED_IPS,
  },
  rateLimit: {
    windowSeconds: toInt(process.env.RATE_LIMIT_WINDOW_SECONDS, 60),
    maxRequests: toInt(process.env.RATE_LIMIT_MAX_REQUESTS, 100),
  },
  auth: {
    otp: {
      length: toInt(process.env.OTP_LENGTH, 6),
      expirySeconds: toInt(process.env.OTP_EXPIRY_SECONDS, 600),
      sendCooldownSeconds: toInt(process.env.OTP_SEND_COOLDOWN_SECONDS, 60),
      maxVerifyAttempts: toInt(process.env.MAX_OTP_VERIFY_ATTEMPTS, 5),
      verifyWindowSeconds: toInt(process.env.OTP_VERIFY_WINDOW_SECONDS, 600),
      verifiedTtlSeconds: toInt(process.env.OTP_VERIFIED_TTL_SECONDS, 900),
    },
    password: {
      bcryptRounds: toInt(process.env.PASSWORD_BCRYPT_ROUNDS, 12),
    },
    session: {
      tokenLength: toInt(process.env.SESSION_TOKEN_LENGTH, 32), // bytes for crypto.randomBytes
      ttlSeconds: toInt(process.env.ACCESS_TOKEN_EXPIRE_MINUTES, 43200) * 60, // 30 days
      cachePrefix: 'session:token:',
    },
  },
  prediction: {
    modelPath: process.env.MODEL_PATH || 'models/rl_jewelry_model/model.json',
    featureExtractorPath:
      process.env.FEATURE_EXTRACTOR_PATH || 'models/feature_extractor/model.json',
    scalerPath: process.env.SCALER_PATH || 'models/scaler.json',
    pairwiseFeaturesPath: process.env.PAIRWISE_FEATURES_PATH || 'models/pairwise_features.json',
    imageSize: toInt(process.env.PREDICTION_IMAGE_SIZE, 224),
    featureSize: toInt(process.env.PREDICTION_FEATURE_SIZE, 1280),
    topK: toInt(process.env.PREDICTION_TOP_K, 10),
  },
  keepAlive: {
    url: process.env.KEEP_ALIVE_URL,
    intervalSeconds: toInt(process.env.KEEP_ALIVE_INTERVAL_SECONDS, 840), // 14 minutes
    retryAttempts: toInt(process.env.KEEP_ALIVE_RETRY_ATTEMPTS, 3),
    retryDelaySeconds: toInt(process.env.KEEP_ALIVE_RETRY_DELAY_SECONDS, 30),
    timeoutSeconds: toInt(process.env.KEEP_ALIVE_TIMEOUT_SECONDS, 10),
  },
});

export type AppConfig = ReturnType<typeof configuration>;

export default configuration;
