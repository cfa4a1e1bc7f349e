import {
  ArrayMaxSize,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Length,
  Matches,
  Max,
  Min,
} from 'class-validator';

/**
 * DTO for ingesting an already extracted document
 */
export class IngestDocumentDTO {
  @IsNotEmpty()
  @IsString()
  @Length(1, 128)
  @Matches(/^[A-Za-z0-9._:-]+$/)
  documentId!: string;

  @IsOptional()
  @IsString()
  @Length(1, 255)
  title?: string;

  @IsString()
  text!: string;

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(10000)
  @IsString({ each: true })
  pages?: string[];

  @IsOptional()
  @IsInt()
  @Min(2)
  @Max(8192)
  chunkSizeTokens?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(8191)
  overlapTokens?: number;
}

/**
 * DTO for asking a question against the indexed documents
 */
export class QueryDocumentsDTO {
  @IsNotEmpty()
  @IsString()
  @Length(1, 10000)
  question!: string;

  @IsOptional()
  @IsString()
  @Length(1, 128)
  documentId?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(50)
  k?: number;
}
