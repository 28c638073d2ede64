import {
  IsNotEmpty,
  IsString,
  IsOptional,
  IsEmail,
  IsEnum,
  IsDateString,
  IsUUID,
  IsBoolean,
  MaxLength,
} from 'class-validator';
import { Gender } from '../entities/student.entity';

export class StudentProfileFieldsDto {
  @IsNotEmpty({ message: 'studentId should not be empty' })
  @IsString()
  @MaxLength(20)
  studentId!: string;

  @IsNotEmpty({ message: 'rollNumber should not be empty' })
  @IsString()
  @MaxLength(10)
  rollNumber!: string;

  @IsOptional()
  @IsUUID('all', { message: 'classId must be a valid id' })
  classId?: string;

  @IsEnum(Gender, { message: 'gender must be one of M, F, O' })
  gender!: Gender;

  @IsNotEmpty({ message: 'guardianName should not be empty' })
  @IsString()
  @MaxLength(100)
  guardianName!: string;

  @IsNotEmpty({ message: 'guardianPhone should not be empty' })
  @IsString()
  @MaxLength(15)
  guardianPhone!: string;

  @IsOptional()
  @IsEmail({}, { message: 'guardianEmail must be a valid email' })
  guardianEmail?: string;

  @IsOptional()
  @IsString()
  @MaxLength(15)
  emergencyContact?: string;

  @IsDateString({}, { message: 'admissionDate must be a valid date' })
  admissionDate!: string;

  @IsOptional()
  @IsString()
  @MaxLength(5)
  bloodGroup?: string;

  @IsOptional()
  @IsString()
  medicalConditions?: string;
}

export class CreateStudentDto extends StudentProfileFieldsDto {
  @IsUUID('all', { message: 'userId must be a valid id' })
  userId!: string;

  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}
