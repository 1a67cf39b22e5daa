import { IsOptional, IsString, MaxLength } from 'class-validator';

/**
 * Multipart text fields that accompany the file upload.
 *
 * The file itself is handled by Multer via @UploadedFile() and is not
 * part of this DTO.
 */
export class UploadDocumentDto {
  /**
   * Overrides the stored file name.
   * If omitted, the original file name of the upload is used.
   */
  @IsOptional()
  @IsString()
  @MaxLength(255)
  fileName?: string;
}
