import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { S3Client, type S3ClientConfig } from '@aws-sdk/client-s3';
import { BlobManagerService } from '../application/blob-manager.service';
import { IBlobStorageToken, type IBlobStorage } from '../domain/blob-storage.interface';
import { MediaController } from '../interfaces/controllers/media.controller';
import { LocalBlobStorage } from './local-blob-storage';
import { S3BlobStorage } from './s3-blob-storage';

/** Custom endpoints (MinIO, R2, Spaces) are addressed path-style. */
export const createS3ClientConfig = (configService: ConfigService): S3ClientConfig => {
  const region = configService.get<string>('storage.s3.region');
  const key = configService.get<string>('storage.s3.key');
  const secret = configService.get<string>('storage.s3.secret');
  if (!region || !key || !secret) {
    throw new Error('Storage configuration is missing');
  }

  const endpoint = configService.get<string>('storage.s3.endpoint');
  return {
    region,
    ...(endpoint ? { endpoint } : {}),
    forcePathStyle: Boolean(endpoint),
    credentials: {
      accessKeyId: key,
      secretAccessKey: secret,
    },
  };
};

export const createBlobStorage = (configService: ConfigService): IBlobStorage => {
  const publicBaseUrl =
    configService.get<string>('storage.publicBaseUrl') ?? 'http://localhost:3001/api/media';

  if (configService.get<string>('storage.driver') !== 's3') {
    return new LocalBlobStorage({
      root: configService.get<string>('storage.localRoot') ?? './uploads',
      publicBaseUrl,
    });
  }

  const bucket = configService.get<string>('storage.s3.bucket');
  if (!bucket) {
    throw new Error('Storage configuration is missing');
  }

  return new S3BlobStorage({
    client: new S3Client(createS3ClientConfig(configService)),
    bucket,
    prefix: configService.get<string>('storage.s3.prefix') ?? '',
    publicBaseUrl,
  });
};

@Module({
  controllers: [MediaController],
  providers: [
    {
      provide: IBlobStorageToken,
      inject: [ConfigService],
      useFactory: createBlobStorage,
    },
    BlobManagerService,
  ],
  exports: [BlobManagerService],
})
export class StorageModule {}
