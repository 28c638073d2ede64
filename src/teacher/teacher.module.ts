import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Teacher } from './entities/teacher.entity';
import { Class } from '../classes/entity/class.entity';
import { Student } from '../student/entities/student.entity';
import { TeachersService } from './teacher.service';
import { TeacherController } from './teacher.controller';

@Module({
  imports: [TypeOrmModule.forFeature([Teacher, Class, Student])],
  providers: [TeachersService],
  controllers: [TeacherController],
  exports: [TeachersService],
})
export class TeachersModule {}
