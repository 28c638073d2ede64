import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { User } from '../user/entities/user.entity';
import { Teacher } from '../teacher/entities/teacher.entity';
import { Student } from '../student/entities/student.entity';
import { Class } from '../classes/entity/class.entity';
import { Role } from '../user/enums/role.enum';
import { Caller, StudentLink, TeacherLink } from '../common/access/caller';

/**
 * Turns an account id into the request's Caller: the role from the profile
 * plus the teacher/student facts the access policy matches against.
 */
@Injectable()
export class CallerService {
  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    @InjectRepository(Teacher)
    private readonly teacherRepository: Repository<Teacher>,
    @InjectRepository(Student)
    private readonly studentRepository: Repository<Student>,
    @InjectRepository(Class)
    private readonly classRepository: Repository<Class>,
  ) {}

  /** Null when the account is gone or deactivated. */
  async resolve(userId: string): Promise<Caller | null> {
    const user = await this.userRepository.findOne({
      where: { id: userId },
      relations: { profile: true },
    });
    if (!user || !user.isActive) return null;

    const base = { userId: user.id, username: user.username };
    const role = user.profile?.role ?? Role.STUDENT;

    switch (role) {
      case Role.ADMIN:
        return { ...base, role: Role.ADMIN };
      case Role.STAFF:
        return { ...base, role: Role.STAFF };
      case Role.TEACHER:
        return { ...base, role: Role.TEACHER, teacher: await this.teacherLink(user.id) };
      case Role.STUDENT:
        return { ...base, role: Role.STUDENT, student: await this.studentLink(user.id) };
    }
  }

  private async teacherLink(userId: string): Promise<TeacherLink | null> {
    const teacher = await this.teacherRepository.findOne({ where: { userId } });
    if (!teacher || !teacher.isActive) return null;

    const classes = await this.classRepository.find({
      select: { id: true },
      where: { teacherId: teacher.id },
    });
    return { id: teacher.id, classIds: classes.map((c) => c.id) };
  }

  private async studentLink(userId: string): Promise<StudentLink | null> {
    const student = await this.studentRepository.findOne({ where: { userId } });
    if (!student || !student.isActive) return null;
    return { id: student.id, classId: student.classId };
  }
}
