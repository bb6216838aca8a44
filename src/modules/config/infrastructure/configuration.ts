const toInt = (value: string | undefined, fallback: number) => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const toList = (value: string | undefined, fallback: string[]) => {
  if (!value) return fallback;
  return value
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean);
};

export type StorageDriver = 'local' | 's3';

const toStorageDriver = (value: string | undefined): StorageDriver =>
  value === 's3' ? 's3' : 'local';

export default () => ({
  app: {
    port: toInt(process.env.PORT, 3001),
    apiPrefix: process.env.API_PREFIX || 'api',
  },
  cors: {
    origin: process.env.CORS_ORIGIN || '*',
  },
  database: {
    url: process.env.DATABASE_URL,
  },
  jwt: {
    secret: process.env.JWT_SECRET,
  },
  auth: {
    staffRoles: toList(process.env.STAFF_ROLES, ['admin', 'builder']),
  },
  storage: {
    driver: toStorageDriver(process.env.STORAGE_DRIVER),
    localRoot: process.env.STORAGE_LOCAL_ROOT || './uploads',
    publicBaseUrl:
      process.env.STORAGE_PUBLIC_BASE_URL || 'http://localhost:3001/api/media',
    // 5 MiB
    maxFileSize: toInt(process.env.STORAGE_MAX_FILE_SIZE, 5 * 1024 * 1024),
    s3: {
      region: process.env.STORAGE_S3_REGION,
      bucket: process.env.STORAGE_S3_BUCKET,
      endpoint: process.env.STORAGE_S3_ENDPOINT,
      key: process.env.STORAGE_S3_KEY,
      secret: process.env.STORAGE_S3_SECRET,
      prefix: process.env.STORAGE_S3_PREFIX || 'galleries',
    },
  },
});
