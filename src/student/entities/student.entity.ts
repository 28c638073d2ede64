import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  OneToOne,
  ManyToOne,
  JoinColumn,
  Index,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';
import { User } from '../../user/entities/user.entity';
import { Class } from '../../classes/entity/class.entity';

export enum Gender {
  MALE = 'M',
  FEMALE = 'F',
  OTHER = 'O',
}

export const GENDER_DISPLAY: Record<Gender, string> = {
  [Gender.MALE]: 'Male',
  [Gender.FEMALE]: 'Female',
  [Gender.OTHER]: 'Other',
};

@Index('UQ_student_roll_class', ['rollNumber', 'classId'], { unique: true })
@Entity('students')
export class Student {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @OneToOne(() => User, (user) => user.student, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user?: User;

  @Column({ type: 'uuid', unique: true })
  userId!: string;

  @Column({ length: 20, unique: true })
  studentId!: string;

  @Column({ length: 10 })
  rollNumber!: string;

  @ManyToOne(() => Class, (klass) => klass.students, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'classId' })
  class?: Class | null;

  @Column({ type: 'uuid', nullable: true })
  classId!: string | null;

  @Column({ type: 'enum', enum: Gender })
  gender!: Gender;

  @Column({ length: 100 })
  guardianName!: string;

  @Column({ length: 15 })
  guardianPhone!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  guardianEmail!: string | null;

  @Column({ type: 'varchar', length: 15, nullable: true })
  emergencyContact!: string | null;

  @Column({ type: 'date' })
  admissionDate!: string;

  @Column({ type: 'varchar', length: 5, nullable: true })
  bloodGroup!: string | null;

  @Column({ type: 'text', nullable: true })
  medicalConditions!: string | null;

  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
