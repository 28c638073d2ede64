import { User } from '../user/entities/user.entity';
import { Profile } from '../user/entities/profile.entity';
import { Subject } from '../subject/entities/subject.entity';
import { Teacher } from '../teacher/entities/teacher.entity';
import { Class } from '../classes/entity/class.entity';
import { Student } from '../student/entities/student.entity';
import { Assignment } from '../assignment/entities/assignment.entity';
import { Grade } from '../grades/entity/grade.entity';
import { Attendance } from '../attendance/entity/attendance.entity';
import { Log } from '../logs/logs.entity';

export const ENTITIES = [User, Profile, Subject, Teacher, Class, Student, Assignment, Grade, Attendance, Log];
