import { IsISO8601, IsNotEmpty, IsString, Matches, MaxLength } from 'class-validator';

export class BookFormDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(1000)
  author!: string;

  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'publishDate must use the yyyy-MM-dd format' })
  @IsISO8601({ strict: true }, { message: 'publishDate must be a valid date' })
  publishDate!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  description!: string;
}
