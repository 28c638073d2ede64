import { Repository } from 'typeorm';
import { DashboardService, attendancePercentage } from './dashboard.service';
import { Teacher } from '../teacher/entities/teacher.entity';
import { Student } from '../student/entities/student.entity';
import { Class } from '../classes/entity/class.entity';
import { Subject } from '../subject/entities/subject.entity';
import { Assignment } from '../assignment/entities/assignment.entity';
import { Grade } from '../grades/entity/grade.entity';
import { Attendance } from '../attendance/entity/attendance.entity';
import {
  adminCaller,
  staffCaller,
  studentCaller,
  teacherCaller,
  unlinkedTeacher,
} from '../../test/support/callers';
import { queryBuilderMock } from '../../test/support/query-builder.mock';

describe('attendancePercentage', () => {
  it('is zero without records', () => {
    expect(attendancePercentage(0, 0)).toBe(0);
  });

  it('rounds to two decimals', () => {
    expect(attendancePercentage(2, 3)).toBe(66.67);
  });
});

describe('DashboardService', () => {
  let service: DashboardService;
  const subjectQb = queryBuilderMock();
  const teacherRepo = { count: jest.fn() };
  const studentRepo = { count: jest.fn() };
  const classRepo = { count: jest.fn(), findOne: jest.fn() };
  const subjectRepo = { count: jest.fn(), createQueryBuilder: jest.fn(() => subjectQb) };
  const assignmentRepo = { count: jest.fn() };
  const gradeRepo = { count: jest.fn() };
  const attendanceRepo = { count: jest.fn() };

  beforeEach(() => {
    jest.clearAllMocks();
    service = new DashboardService(
      teacherRepo as unknown as Repository<Teacher>,
      studentRepo as unknown as Repository<Student>,
      classRepo as unknown as Repository<Class>,
      subjectRepo as unknown as Repository<Subject>,
      assignmentRepo as unknown as Repository<Assignment>,
      gradeRepo as unknown as Repository<Grade>,
      attendanceRepo as unknown as Repository<Attendance>,
    );
  });

  it('gives admins school-wide totals', async () => {
    studentRepo.count.mockResolvedValueOnce(120);
    teacherRepo.count.mockResolvedValueOnce(9);
    classRepo.count.mockResolvedValueOnce(6);
    subjectRepo.count.mockResolvedValueOnce(11);
    assignmentRepo.count.mockResolvedValueOnce(40);

    await expect(service.statsFor(adminCaller)).resolves.toEqual({
      totalStudents: 120,
      totalTeachers: 9,
      totalClasses: 6,
      totalSubjects: 11,
      totalAssignments: 40,
    });
    expect(studentRepo.count).toHaveBeenCalledWith({ where: { isActive: true } });
  });

  it('gives teachers counts over their own classes', async () => {
    studentRepo.count.mockResolvedValueOnce(12);
    assignmentRepo.count.mockResolvedValueOnce(3);
    subjectQb.getCount.mockResolvedValueOnce(2);

    await expect(service.statsFor(teacherCaller('t1', ['c1', 'c2']))).resolves.toEqual({
      myClasses: 2,
      myStudents: 12,
      pendingAssignments: 3,
      subjectsTeaching: 2,
    });
  });

  it('does not count students for a teacher without classes', async () => {
    assignmentRepo.count.mockResolvedValueOnce(0);
    subjectQb.getCount.mockResolvedValueOnce(1);

    const stats = await service.statsFor(teacherCaller('t1', []));

    expect(stats).toEqual({ myClasses: 0, myStudents: 0, pendingAssignments: 0, subjectsTeaching: 1 });
    expect(studentRepo.count).not.toHaveBeenCalled();
  });

  it('gives students their class, work and attendance', async () => {
    classRepo.findOne.mockResolvedValueOnce({ id: 'c1', name: 'Grade 5 A' });
    assignmentRepo.count.mockResolvedValueOnce(6);
    gradeRepo.count.mockResolvedValueOnce(4);
    attendanceRepo.count.mockResolvedValueOnce(8).mockResolvedValueOnce(7);

    await expect(service.statsFor(studentCaller('s1', 'c1'))).resolves.toEqual({
      myClass: 'Grade 5 A',
      totalAssignments: 6,
      completedAssignments: 4,
      attendancePercentage: 87.5,
    });
  });

  it('reports an unenrolled student', async () => {
    gradeRepo.count.mockResolvedValueOnce(0);
    attendanceRepo.count.mockResolvedValueOnce(0).mockResolvedValueOnce(0);

    await expect(service.statsFor(studentCaller('s1', null))).resolves.toEqual({
      myClass: 'Not assigned',
      totalAssignments: 0,
      completedAssignments: 0,
      attendancePercentage: 0,
    });
    expect(classRepo.findOne).not.toHaveBeenCalled();
  });

  it('returns an empty payload for staff and unlinked accounts', async () => {
    await expect(service.statsFor(staffCaller)).resolves.toEqual({});
    await expect(service.statsFor(unlinkedTeacher)).resolves.toEqual({});
  });
});
