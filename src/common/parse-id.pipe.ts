import {
  ArgumentMetadata,
  BadRequestException,
  Injectable,
  ParseIntPipe,
  PipeTransform,
} from '@nestjs/common';

/** `ParseIntPipe` that also refuses ids a JavaScript number cannot hold exactly. */
@Injectable()
export class ParseIdPipe implements PipeTransform<string, Promise<number>> {
  private readonly parseInt = new ParseIntPipe();

  async transform(value: string, metadata: ArgumentMetadata): Promise<number> {
    const id = await this.parseInt.transform(value, metadata);
    if (!Number.isSafeInteger(id)) {
      throw new BadRequestException('Validation failed (id is out of range)');
    }
    return id;
  }
}
