import { ApiProperty } from '@nestjs/swagger';
import { ClassificationResultDto } from './classification-result.dto';

export class ClassifyDocumentResponseDto {
  @ApiProperty({ example: 'P123' })
  patientId!: string;

  @ApiProperty({ type: ClassificationResultDto })
  classification!: ClassificationResultDto;

  @ApiProperty({
    description: 'Object store location of the archived original',
    example: 'gs://medical-documents/patients/P123/ultrasound_report/scan.pdf',
  })
  storageLocation!: string;

  @ApiProperty({ enum: ['processed'], example: 'processed' })
  status!: 'processed';
}
