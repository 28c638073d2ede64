import { OmitType, PartialType } from '@nestjs/mapped-types';
import { IsOptional, IsUUID } from 'class-validator';
import { CreateStudentDto } from './create-student.dto';

export class UpdateStudentDto extends PartialType(OmitType(CreateStudentDto, ['userId', 'classId'] as const)) {
  // null removes the student from its class
  @IsOptional()
  @IsUUID('all', { message: 'classId must be a valid id' })
  classId?: string | null;
}
