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
import { AssignmentsService } from './assignment.service';
import { AssignmentQueryDto, CreateAssignmentDto, UpdateAssignmentDto } from './dto/assignment.dto';

@ApiTags('Assignments')
@ApiBearerAuth()
@Controller('assignments')
@UseGuards(JwtAuthGuard, RolesGuard)
export class AssignmentsController {
  constructor(private readonly assignmentsService: AssignmentsService) {}

  @Get()
  findAll(@CurrentCaller() caller: Caller, @Query() query: AssignmentQueryDto) {
    return this.assignmentsService.findAll(caller, query);
  }

  @Post()
  @ApiOperation({ summary: 'Create an assignment; teachers become its author' })
  create(@CurrentCaller() caller: Caller, @Body() dto: CreateAssignmentDto) {
    return this.assignmentsService.create(caller, dto);
  }

  @Get(':id')
  findOne(@CurrentCaller() caller: Caller, @Param('id', ParseUUIDPipe) id: string) {
    return this.assignmentsService.findOne(caller, id);
  }

  @Put(':id')
  @ApiOperation({ summary: 'Update an assignment; a totalMarks change regrades its grades' })
  update(
    @CurrentCaller() caller: Caller,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateAssignmentDto,
  ) {
    return this.assignmentsService.update(caller, id, dto);
  }

  @Patch(':id')
  patch(
    @CurrentCaller() caller: Caller,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateAssignmentDto,
  ) {
    return this.assignmentsService.update(caller, id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Deactivate an assignment' })
  async remove(@CurrentCaller() caller: Caller, @Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.assignmentsService.deactivate(caller, id);
  }
}
