import { Controller, Get, Post, Body, Param, UseGuards, ParseUUIDPipe } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../auth/guards/roles.guard';
import { Roles } from '../common/decorators/roles.decorator';
import { CurrentCaller } from '../common/decorators/current-caller.decorator';
import { Caller } from '../common/access/caller';
import { Role } from './enums/role.enum';
import { UsersService } from './user.service';
import { ConvertToStudentDto, ConvertToTeacherDto } from './dtos/convert-user.dto';

@ApiTags('Users')
@ApiBearerAuth()
@Controller('users')
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles(Role.ADMIN)
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get()
  @ApiOperation({ summary: 'List accounts with their profiles' })
  findAll(@CurrentCaller() caller: Caller) {
    return this.usersService.findAll(caller);
  }

  @Post('convert-to-teacher')
  @ApiOperation({ summary: 'Give an existing account a teacher profile' })
  convertToTeacher(@CurrentCaller() caller: Caller, @Body() dto: ConvertToTeacherDto) {
    return this.usersService.convertToTeacher(caller, dto);
  }

  @Post('convert-to-student')
  @ApiOperation({ summary: 'Give an existing account a student profile' })
  convertToStudent(@CurrentCaller() caller: Caller, @Body() dto: ConvertToStudentDto) {
    return this.usersService.convertToStudent(caller, dto);
  }

  @Get(':id')
  findOne(@CurrentCaller() caller: Caller, @Param('id', ParseUUIDPipe) id: string) {
    return this.usersService.findOne(caller, id);
  }
}
