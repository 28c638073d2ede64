import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DashboardController } from './dashboard.controller';
import { DashboardService } from './dashboard.service';
import { Teacher } from '../teacher/entities/teacher.entity';
import { Student } from '../student/entities/student.entity';
import { Class } from '../classes/entity/class.entity';
import { Subject } from '../subject/entities/subject.entity';
import { Assignment } from '../assignment/entities/assignment.entity';
import { Grade } from '../grades/entity/grade.entity';
import { Attendance } from '../attendance/entity/attendance.entity';

@Module({
  imports: [TypeOrmModule.forFeature([Teacher, Student, Class, Subject, Assignment, Grade, Attendance])],
  controllers: [DashboardController],
  providers: [DashboardService],
})
export class DashboardModule {}
