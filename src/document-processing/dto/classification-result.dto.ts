import { ApiProperty } from '@nestjs/swagger';
import { ClassificationStatus } from '../../classification/domain/enums/classification-status.enum';

export class ClassificationResultDto {
  @ApiProperty({ example: 'ultrasound report' })
  label!: string;

  @ApiProperty({ example: 0.91, minimum: 0, maximum: 1 })
  confidence!: number;

  @ApiProperty({
    enum: ClassificationStatus,
    example: ClassificationStatus.SUCCESS,
  })
  status!: ClassificationStatus;
}
