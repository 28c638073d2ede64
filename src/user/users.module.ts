import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { User } from './entities/user.entity';
import { Profile } from './entities/profile.entity';
import { UsersService } from './user.service';
import { UsersController } from './users.controller';
import { TeachersModule } from '../teacher/teacher.module';
import { StudentsModule } from '../student/student.module';

@Module({
  imports: [TypeOrmModule.forFeature([User, Profile]), TeachersModule, StudentsModule],
  providers: [UsersService],
  controllers: [UsersController],
  exports: [UsersService],
})
export class UsersModule {}
