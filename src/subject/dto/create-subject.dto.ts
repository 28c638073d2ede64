import { IsNotEmpty, IsString, IsOptional, IsInt, Min, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class CreateSubjectDto {
  @ApiProperty()
  @IsNotEmpty({ message: 'name should not be empty' })
  @IsString()
  @MaxLength(100)
  name!: string;

  @ApiProperty({ maxLength: 10 })
  @IsNotEmpty({ message: 'code should not be empty' })
  @IsString()
  @MaxLength(10, { message: 'code must be at most 10 characters' })
  code!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;

  @ApiPropertyOptional({ default: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  credits?: number;
}
