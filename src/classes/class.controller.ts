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
import { ClassService } from './class.service';
import { CreateClassDto, UpdateClassDto } from './dtos/class.dto';

@ApiTags('Classes')
@ApiBearerAuth()
@Controller('classes')
@UseGuards(JwtAuthGuard, RolesGuard)
export class ClassController {
  constructor(private readonly classService: ClassService) {}

  @Get()
  @ApiOperation({ summary: 'List classes visible to the caller' })
  findAll(@CurrentCaller() caller: Caller, @Query() query: ListQueryDto) {
    return this.classService.findAll(caller, query);
  }

  @Post()
  create(@CurrentCaller() caller: Caller, @Body() dto: CreateClassDto) {
    return this.classService.create(caller, dto);
  }

  @Get(':id')
  findOne(@CurrentCaller() caller: Caller, @Param('id', ParseUUIDPipe) id: string) {
    return this.classService.findOne(caller, id);
  }

  @Put(':id')
  update(
    @CurrentCaller() caller: Caller,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateClassDto,
  ) {
    return this.classService.update(caller, id, dto);
  }

  @Patch(':id')
  patch(
    @CurrentCaller() caller: Caller,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateClassDto,
  ) {
    return this.classService.update(caller, id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Deactivate a class' })
  async remove(@CurrentCaller() caller: Caller, @Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.classService.deactivate(caller, id);
  }
}
