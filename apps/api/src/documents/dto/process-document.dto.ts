import { IsInt, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';

/** Body of POST /documents/:id/process and POST /documents/:id/retry. */
export class ProcessDocumentDto {
  /** Caps the summary length; defaults to SUMMARIZER_MAX_TOKENS */
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65_536)
  maxTokens?: number;

  /** Remote model variant; defaults to SUMMARIZER_MODEL_ID */
  @IsOptional()
  @IsString()
  @MaxLength(128)
  modelId?: string;
}
