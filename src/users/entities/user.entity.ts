import { UserRole } from '../../common/constants/roles';

export type UserEntity = {
  id: string;
  email: string;
  passwordHash: string;
  fullName: string | null;
  phone: string | null;
  role: UserRole;
  createdAt: Date;
};

export type SafeUser = Omit<UserEntity, 'passwordHash'>;

export type NewUser = Omit<UserEntity, 'createdAt'>;
