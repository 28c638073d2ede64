import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, MoreThanOrEqual, Repository } from 'typeorm';
import { Teacher } from '../teacher/entities/teacher.entity';
import { Student } from '../student/entities/student.entity';
import { Class } from '../classes/entity/class.entity';
import { Subject } from '../subject/entities/subject.entity';
import { Assignment } from '../assignment/entities/assignment.entity';
import { Grade } from '../grades/entity/grade.entity';
import { Attendance, AttendanceStatus } from '../attendance/entity/attendance.entity';
import { Caller, StudentLink, TeacherLink } from '../common/access/caller';
import { Role } from '../user/enums/role.enum';
import { roundTo2 } from '../grades/grade-letter';

export interface AdminStats {
  totalStudents: number;
  totalTeachers: number;
  totalClasses: number;
  totalSubjects: number;
  totalAssignments: number;
}

export interface TeacherStats {
  myClasses: number;
  myStudents: number;
  pendingAssignments: number;
  subjectsTeaching: number;
}

export interface StudentStats {
  myClass: string;
  totalAssignments: number;
  completedAssignments: number;
  attendancePercentage: number;
}

export type DashboardStats = AdminStats | TeacherStats | StudentStats | Record<string, never>;

/** Present and late days over all recorded days, as a percentage with 2 decimals. */
export function attendancePercentage(attended: number, total: number): number {
  if (total === 0) return 0;
  return roundTo2((attended / total) * 100);
}

@Injectable()
export class DashboardService {
  constructor(
    @InjectRepository(Teacher) private teacherRepository: Repository<Teacher>,
    @InjectRepository(Student) private studentRepository: Repository<Student>,
    @InjectRepository(Class) private classRepository: Repository<Class>,
    @InjectRepository(Subject) private subjectRepository: Repository<Subject>,
    @InjectRepository(Assignment) private assignmentRepository: Repository<Assignment>,
    @InjectRepository(Grade) private gradeRepository: Repository<Grade>,
    @InjectRepository(Attendance) private attendanceRepository: Repository<Attendance>,
  ) {}

  async statsFor(caller: Caller): Promise<DashboardStats> {
    switch (caller.role) {
      case Role.ADMIN:
        return this.getAdminStats();
      case Role.TEACHER:
        return caller.teacher ? this.getTeacherStats(caller.teacher) : {};
      case Role.STUDENT:
        return caller.student ? this.getStudentStats(caller.student) : {};
      case Role.STAFF:
        return {};
    }
  }

  async getAdminStats(): Promise<AdminStats> {
    const [totalStudents, totalTeachers, totalClasses, totalSubjects, totalAssignments] = await Promise.all([
      this.studentRepository.count({ where: { isActive: true } }),
      this.teacherRepository.count({ where: { isActive: true } }),
      this.classRepository.count({ where: { isActive: true } }),
      this.subjectRepository.count(),
      this.assignmentRepository.count({ where: { isActive: true } }),
    ]);
    return { totalStudents, totalTeachers, totalClasses, totalSubjects, totalAssignments };
  }

  async getTeacherStats(teacher: TeacherLink): Promise<TeacherStats> {
    const [myStudents, pendingAssignments, subjectsTeaching] = await Promise.all([
      teacher.classIds.length > 0 ? this.studentRepository.count({ where: { classId: In(teacher.classIds) } }) : 0,
      this.assignmentRepository.count({
        where: { teacherId: teacher.id, dueDate: MoreThanOrEqual(new Date()) },
      }),
      this.subjectRepository
        .createQueryBuilder('subject')
        .innerJoin('subject.teachers', 'teacher', 'teacher.id = :teacherId', { teacherId: teacher.id })
        .getCount(),
    ]);
    return { myClasses: teacher.classIds.length, myStudents, pendingAssignments, subjectsTeaching };
  }

  async getStudentStats(student: StudentLink): Promise<StudentStats> {
    const klass = student.classId ? await this.classRepository.findOne({ where: { id: student.classId } }) : null;

    const [totalAssignments, completedAssignments, totalDays, attendedDays] = await Promise.all([
      klass ? this.assignmentRepository.count({ where: { classId: klass.id } }) : 0,
      this.gradeRepository.count({ where: { studentId: student.id } }),
      this.attendanceRepository.count({ where: { studentId: student.id } }),
      this.attendanceRepository.count({
        where: { studentId: student.id, status: In([AttendanceStatus.PRESENT, AttendanceStatus.LATE]) },
      }),
    ]);

    return {
      myClass: klass ? klass.name : 'Not assigned',
      totalAssignments,
      completedAssignments,
      attendancePercentage: attendancePercentage(attendedDays, totalDays),
    };
  }
}
