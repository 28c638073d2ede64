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
import { GradeService } from './grade.service';
import { CreateGradeDto, GradeQueryDto, UpdateGradeDto } from './dtos/grade.dto';

@ApiTags('Grades')
@ApiBearerAuth()
@Controller('grades')
@UseGuards(JwtAuthGuard, RolesGuard)
export class GradeController {
  constructor(private readonly gradeService: GradeService) {}

  @Get()
  findAll(@CurrentCaller() caller: Caller, @Query() query: GradeQueryDto) {
    return this.gradeService.findAll(caller, query);
  }

  @Post()
  @ApiOperation({ summary: 'Grade a student on an assignment; the letter is computed' })
  create(@CurrentCaller() caller: Caller, @Body() dto: CreateGradeDto) {
    return this.gradeService.create(caller, dto);
  }

  @Get(':id')
  findOne(@CurrentCaller() caller: Caller, @Param('id', ParseUUIDPipe) id: string) {
    return this.gradeService.findOne(caller, id);
  }

  @Put(':id')
  update(
    @CurrentCaller() caller: Caller,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateGradeDto,
  ) {
    return this.gradeService.update(caller, id, dto);
  }

  @Patch(':id')
  patch(
    @CurrentCaller() caller: Caller,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateGradeDto,
  ) {
    return this.gradeService.update(caller, id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@CurrentCaller() caller: Caller, @Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.gradeService.remove(caller, id);
  }
}
