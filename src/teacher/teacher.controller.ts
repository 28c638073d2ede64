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
import { ListQueryDto } from '../common/dto/list-query.dto';
import { TeachersService } from './teacher.service';
import { CreateTeacherDto } from './dto/create-teacher.dto';
import { UpdateTeacherDto } from './dto/update-teacher.dto';

@ApiTags('Teachers')
@ApiBearerAuth()
@Controller('teachers')
@UseGuards(JwtAuthGuard, RolesGuard)
export class TeacherController {
  constructor(private readonly teachersService: TeachersService) {}

  @Get()
  @ApiOperation({ summary: 'List teachers' })
  findAll(@CurrentCaller() caller: Caller, @Query() query: ListQueryDto) {
    return this.teachersService.findAll(caller, query);
  }

  @Post()
  @ApiOperation({ summary: 'Create a teacher profile for an existing account' })
  create(@CurrentCaller() caller: Caller, @Body() dto: CreateTeacherDto) {
    return this.teachersService.create(caller, dto);
  }

  @Get(':id')
  findOne(@CurrentCaller() caller: Caller, @Param('id', ParseUUIDPipe) id: string) {
    return this.teachersService.findOne(caller, id);
  }

  @Get(':id/classes')
  @ApiOperation({ summary: 'Classes taught by the teacher' })
  classes(@CurrentCaller() caller: Caller, @Param('id', ParseUUIDPipe) id: string) {
    return this.teachersService.classesOf(caller, id);
  }

  @Get(':id/students')
  @ApiOperation({ summary: "Students in the teacher's classes" })
  students(@CurrentCaller() caller: Caller, @Param('id', ParseUUIDPipe) id: string) {
    return this.teachersService.studentsOf(caller, id);
  }

  @Put(':id')
  update(
    @CurrentCaller() caller: Caller,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateTeacherDto,
  ) {
    return this.teachersService.update(caller, id, dto);
  }

  @Patch(':id')
  patch(
    @CurrentCaller() caller: Caller,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateTeacherDto,
  ) {
    return this.teachersService.update(caller, id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Deactivate a teacher' })
  async remove(@CurrentCaller() caller: Caller, @Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.teachersService.deactivate(caller, id);
  }
}
