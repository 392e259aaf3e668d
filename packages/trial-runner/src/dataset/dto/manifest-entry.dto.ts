import { IsNotEmpty, IsOptional, IsString, Matches } from 'class-validator';

export class ManifestEntryDto {
  @IsOptional()
  @IsString()
  @Matches(/^[^/\\]+$/, { message: 'id must not contain path separators' })
  id?: string;

  @IsNotEmpty()
  @IsString()
  image!: string;

  @IsOptional()
  @IsString()
  groundTruth?: string;

  @IsOptional()
  @IsString()
  @Matches(/^[A-Za-z0-9_-]+$/)
  templateId?: string;
}
