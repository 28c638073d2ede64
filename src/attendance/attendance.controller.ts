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
import { AttendanceService } from './attendance.service';
import { AttendanceQueryDto, CreateAttendanceDto, UpdateAttendanceDto } from './dtos/attendance.dto';

@ApiTags('Attendance')
@ApiBearerAuth()
@Controller('attendance')
@UseGuards(JwtAuthGuard, RolesGuard)
export class AttendanceController {
  constructor(private readonly attendanceService: AttendanceService) {}

  @Get()
  findAll(@CurrentCaller() caller: Caller, @Query() query: AttendanceQueryDto) {
    return this.attendanceService.findAll(caller, query);
  }

  @Post()
  @ApiOperation({ summary: 'Mark attendance for one student, class, subject and date' })
  create(@CurrentCaller() caller: Caller, @Body() dto: CreateAttendanceDto) {
    return this.attendanceService.create(caller, dto);
  }

  @Get(':id')
  findOne(@CurrentCaller() caller: Caller, @Param('id', ParseUUIDPipe) id: string) {
    return this.attendanceService.findOne(caller, id);
  }

  @Put(':id')
  update(
    @CurrentCaller() caller: Caller,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateAttendanceDto,
  ) {
    return this.attendanceService.update(caller, id, dto);
  }

  @Patch(':id')
  patch(
    @CurrentCaller() caller: Caller,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateAttendanceDto,
  ) {
    return this.attendanceService.update(caller, id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@CurrentCaller() caller: Caller, @Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.attendanceService.remove(caller, id);
  }
}
