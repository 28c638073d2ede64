import { IsBoolean, IsOptional, IsString, IsUUID } from 'class-validator';
import { Transform } from 'class-transformer';

const toBoolean = ({ value }: { value: unknown }) => value === true || value === 'true' || value === '1';

export class ListQueryDto {
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  includeInactive?: boolean;

  @IsOptional()
  @IsString()
  search?: string;
}

export class ClassFilterQueryDto extends ListQueryDto {
  @IsOptional()
  @IsUUID('all', { message: 'classId must be a valid id' })
  classId?: string;
}
