import { IsEnum, IsOptional } from 'class-validator';
import { UserRole } from '../user.types';

export class ListUsersDto {
  @IsOptional()
  @IsEnum(UserRole)
  role?: UserRole;
}
