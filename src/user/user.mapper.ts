import { User, fullName } from './entities/user.entity';
import { Role, ROLE_DISPLAY } from './enums/role.enum';

export interface UserSummary {
  id: string;
  username: string;
  email: string | null;
  firstName: string;
  lastName: string;
  fullName: string;
}

export interface ProfileDetail extends UserSummary {
  role: Role;
  roleDisplay: string;
  phoneNumber: string | null;
  address: string | null;
  dateOfBirth: string | null;
  isActive: boolean;
  lastLoginAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export function toUserSummary(user: User): UserSummary {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    fullName: fullName(user),
  };
}

export function toProfileDetail(user: User): ProfileDetail {
  const role = user.profile?.role ?? Role.STUDENT;
  return {
    ...toUserSummary(user),
    role,
    roleDisplay: ROLE_DISPLAY[role],
    phoneNumber: user.profile?.phoneNumber ?? null,
    address: user.profile?.address ?? null,
    dateOfBirth: user.profile?.dateOfBirth ?? null,
    isActive: user.isActive,
    lastLoginAt: user.lastLoginAt,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}
