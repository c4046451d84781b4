import { Transform } from 'class-transformer';
import { IsEmail, IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import { PASSWORD_MAX_LENGTH, PASSWORD_REGEX } from '../constants/auth.constants';

export class RegisterDto {
    @Transform(({ value }: { value: unknown }) => typeof value === 'string' ? value.trim().toLowerCase() : value)
    @IsEmail()
    email!: string;

    @IsString()
    @MaxLength(PASSWORD_MAX_LENGTH)
    @Matches(PASSWORD_REGEX, {
        message: 'Password must be at least 8 characters, include uppercase, lowercase, and numbers',
    })
    password!: string;

    @IsOptional()
    @IsString()
    @MaxLength(120)
    fullName?: string;

    @IsOptional()
    @IsString()
    @Matches(/^\+?[0-9 ()-]{6,20}$/, { message: 'phone must be a valid phone number' })
    phone?: string;
}
