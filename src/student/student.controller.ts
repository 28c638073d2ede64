import {
  Controller,
  Get,
  Post,
  Put,
  Patch,
  Delete,
  Body,
  Param,
  Query,
  UseGuards,
  HttpCode,
  HttpStatus,
  ParseUUIDPipe,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../auth/guards/roles.guard';
import { CurrentCaller } from '../common/decorators/current-caller.decorator';
import { Caller } from '../common/access/caller';
import { ClassFilterQueryDto } from '../common/dto/list-query.dto';
import { StudentsService } from './student.service';
import { CreateStudentDto } from './dto/create-student.dto';
import { UpdateStudentDto } from './dto/update-student.dto';

@ApiTags('Students')
@ApiBearerAuth()
@Controller('students')
@UseGuards(JwtAuthGuard, RolesGuard)
export class StudentsController {
  constructor(private readonly studentsService: StudentsService) {}

  @Get()
  @ApiOperation({ summary: 'List students visible to the caller' })
  findAll(@CurrentCaller() caller: Caller, @Query() query: ClassFilterQueryDto) {
    return this.studentsService.findAll(caller, query);
  }

  @Post()
  @ApiOperation({ summary: 'Create a student profile for an existing account' })
  create(@CurrentCaller() caller: Caller, @Body() dto: CreateStudentDto) {
    return this.studentsService.create(caller, dto);
  }

  @Get(':id')
  findOne(@CurrentCaller() caller: Caller, @Param('id', ParseUUIDPipe) id: string) {
    return this.studentsService.findOne(caller, id);
  }

  @Put(':id')
  update(
    @CurrentCaller() caller: Caller,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateStudentDto,
  ) {
    return this.studentsService.update(caller, id, dto);
  }

  @Patch(':id')
  patch(
    @CurrentCaller() caller: Caller,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateStudentDto,
  ) {
    return this.studentsService.update(caller, id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Deactivate a student' })
  async remove(@CurrentCaller() caller: Caller, @Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.studentsService.deactivate(caller, id);
  }
}
