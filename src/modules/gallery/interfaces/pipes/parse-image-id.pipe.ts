import { Injectable, PipeTransform } from '@nestjs/common';
import { ValidationError } from '../../../../common/errors/domain.errors';

const IMAGE_ID_PATTERN = /^[1-9]\d*$/;

/** Image ids are positive integers that fit a JS number exactly. */
@Injectable()
export class ParseImageIdPipe implements PipeTransform<string, number> {
  transform(value: string): number {
    const imageId = IMAGE_ID_PATTERN.test(value) ? Number(value) : Number.NaN;
    if (!Number.isSafeInteger(imageId)) {
      throw new ValidationError('invalid_image_id', 'Image id must be a positive integer');
    }
    return imageId;
  }
}
