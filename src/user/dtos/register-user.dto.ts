import {
  IsNotEmpty,
  IsString,
  IsEmail,
  IsOptional,
  IsEnum,
  IsDateString,
  IsInt,
  IsUUID,
  IsArray,
  Min,
  MinLength,
  MaxLength,
  ValidateIf,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Role } from '../enums/role.enum';
import { Gender } from '../../student/entities/student.entity';

const asTeacher = (dto: RegisterUserDto) => dto.role === Role.TEACHER;
const asStudent = (dto: RegisterUserDto) => dto.role === Role.STUDENT;

/**
 * Account + profile in one request. Teacher and student fields are required
 * only for that role and ignored otherwise.
 */
export class RegisterUserDto {
  // Account fields
  @ApiProperty()
  @IsNotEmpty({ message: 'username should not be empty' })
  @IsString()
  @MaxLength(150)
  username!: string;

  @ApiProperty()
  @IsEmail({}, { message: 'email must be a valid email' })
  email!: string;

  @ApiProperty()
  @IsNotEmpty({ message: 'firstName should not be empty' })
  @IsString()
  @MaxLength(150)
  firstName!: string;

  @ApiProperty()
  @IsNotEmpty({ message: 'lastName should not be empty' })
  @IsString()
  @MaxLength(150)
  lastName!: string;

  @ApiProperty({ minLength: 8 })
  @IsString()
  @MinLength(8, { message: 'password must be at least 8 characters long' })
  password!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty({ message: 'passwordConfirm should not be empty' })
  passwordConfirm!: string;

  @ApiProperty({ enum: Role })
  @IsEnum(Role, { message: 'role must be one of admin, teacher, student, staff' })
  role!: Role;

  // Profile fields
  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(15)
  phoneNumber?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  address?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsDateString()
  dateOfBirth?: string;

  // Teacher fields
  @ValidateIf(asTeacher)
  @IsNotEmpty({ message: 'employeeId is required for teachers' })
  @IsString()
  @MaxLength(20)
  employeeId?: string;

  @ValidateIf(asTeacher)
  @IsNotEmpty({ message: 'department is required for teachers' })
  @IsString()
  department?: string;

  @ValidateIf(asTeacher)
  @IsNotEmpty({ message: 'qualification is required for teachers' })
  @IsString()
  qualification?: string;

  @ValidateIf(asTeacher)
  @IsNotEmpty({ message: 'hireDate is required for teachers' })
  @IsDateString()
  hireDate?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  experienceYears?: number;

  @IsOptional()
  @IsString()
  specialization?: string;

  @IsOptional()
  @IsArray()
  @IsUUID('all', { each: true })
  subjectIds?: string[];

  // Student fields
  @ValidateIf(asStudent)
  @IsNotEmpty({ message: 'studentId is required for students' })
  @IsString()
  @MaxLength(20)
  studentId?: string;

  @ValidateIf(asStudent)
  @IsNotEmpty({ message: 'rollNumber is required for students' })
  @IsString()
  @MaxLength(10)
  rollNumber?: string;

  @ValidateIf(asStudent)
  @IsEnum(Gender, { message: 'gender must be one of M, F, O' })
  gender?: Gender;

  @ValidateIf(asStudent)
  @IsNotEmpty({ message: 'guardianName is required for students' })
  @IsString()
  guardianName?: string;

  @ValidateIf(asStudent)
  @IsNotEmpty({ message: 'guardianPhone is required for students' })
  @IsString()
  @MaxLength(15)
  guardianPhone?: string;

  @ValidateIf(asStudent)
  @IsNotEmpty({ message: 'admissionDate is required for students' })
  @IsDateString()
  admissionDate?: string;

  @IsOptional()
  @IsUUID('all', { message: 'classId must be a valid id' })
  classId?: string;

  @IsOptional()
  @IsEmail()
  guardianEmail?: string;

  @IsOptional()
  @IsString()
  @MaxLength(15)
  emergencyContact?: string;

  @IsOptional()
  @IsString()
  @MaxLength(5)
  bloodGroup?: string;

  @IsOptional()
  @IsString()
  medicalConditions?: string;
}
