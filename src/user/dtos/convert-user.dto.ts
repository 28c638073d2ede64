import { IsUUID } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { TeacherProfileFieldsDto } from '../../teacher/dto/create-teacher.dto';
import { StudentProfileFieldsDto } from '../../student/dto/create-student.dto';

export class ConvertToTeacherDto extends TeacherProfileFieldsDto {
  @ApiProperty()
  @IsUUID('all', { message: 'userId must be a valid id' })
  userId!: string;
}

export class ConvertToStudentDto extends StudentProfileFieldsDto {
  @ApiProperty()
  @IsUUID('all', { message: 'userId must be a valid id' })
  userId!: string;
}
