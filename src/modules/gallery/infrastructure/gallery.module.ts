import { Module } from '@nestjs/common';
import { CharactersModule } from '../../characters/infrastructure/characters.module';
import { StorageModule } from '../../storage/infrastructure/storage.module';
import { GalleryStoreService } from '../application/gallery-store.service';
import { GalleryService } from '../application/gallery.service';
import { GalleryController } from '../interfaces/controllers/gallery.controller';

@Module({
  imports: [CharactersModule, StorageModule],
  controllers: [GalleryController],
  providers: [GalleryStoreService, GalleryService],
  exports: [GalleryService],
})
export class GalleryModule {}
