import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, Matches, MaxLength } from 'class-validator';

export const PATIENT_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export class ClassifyDocumentDto {
  @ApiProperty({
    description:
      'Patient identifier; becomes a storage key segment (letters, digits, "_" and "-")',
    example: 'P123',
    maxLength: 128,
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  @Matches(PATIENT_ID_PATTERN, {
    message: 'patientId may only contain letters, digits, "_" and "-"',
  })
  patientId!: string;
}
