import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { LogsModule } from './logs/logs.module';
import { AuthModule } from './auth/auth.module';
import { UsersModule } from './user/users.module';
import { ProfileModule } from './profile/profile.module';
import { SubjectModule } from './subject/subject.module';
import { TeachersModule } from './teacher/teacher.module';
import { ClassModule } from './classes/class.module';
import { StudentsModule } from './student/student.module';
import { AssignmentModule } from './assignment/assignment.module';
import { GradeModule } from './grades/grade.module';
import { AttendanceModule } from './attendance/attendance.module';
import { DashboardModule } from './dashboard/dashboard.module';
import { SystemModule } from './system/system.module';

@Module({
  imports: [
    ConfigModule,
    DatabaseModule,
    LogsModule,
    AuthModule,
    UsersModule,
    ProfileModule,
    SubjectModule,
    TeachersModule,
    ClassModule,
    StudentsModule,
    AssignmentModule,
    GradeModule,
    AttendanceModule,
    DashboardModule,
    SystemModule,
  ],
})
export class AppModule {}
