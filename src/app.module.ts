import { Module } from '@nestjs/common';
import { ConfigModule } from './modules/config/infrastructure/config.module';
import { DatabaseModule } from './modules/database/database.module';
import { AuthModule } from './modules/auth/infrastructure/auth.module';
import { CharactersModule } from './modules/characters/infrastructure/characters.module';
import { StorageModule } from './modules/storage/infrastructure/storage.module';
import { GalleryModule } from './modules/gallery/infrastructure/gallery.module';

@Module({
  imports: [
    ConfigModule,
    DatabaseModule,
    AuthModule,
    CharactersModule,
    StorageModule,
    GalleryModule,
  ],
})
export class AppModule {}
