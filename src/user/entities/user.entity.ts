import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  OneToOne,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';
import { Profile } from './profile.entity';
import { Teacher } from '../../teacher/entities/teacher.entity';
import { Student } from '../../student/entities/student.entity';

@Entity('users')
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 150, unique: true })
  username!: string;

  // Explicit type to avoid reflect-metadata emitting Object for union (string | null)
  @Column({ type: 'varchar', length: 255, nullable: true })
  email!: string | null;

  @Column({ length: 150, default: '' })
  firstName!: string;

  @Column({ length: 150, default: '' })
  lastName!: string;

  @Column()
  password!: string;

  @Column({ default: true })
  isActive!: boolean;

  @Column({ type: 'timestamp', nullable: true })
  lastLoginAt!: Date | null;

  @OneToOne(() => Profile, (profile) => profile.user)
  profile?: Profile;

  @OneToOne(() => Teacher, (teacher) => teacher.user)
  teacher?: Teacher | null;

  @OneToOne(() => Student, (student) => student.user)
  student?: Student | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}

export function fullName(user: Pick<User, 'firstName' | 'lastName' | 'username'>): string {
  const name = `${user.firstName || ''} ${user.lastName || ''}`.trim();
  return name || user.username;
}
