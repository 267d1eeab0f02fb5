import { IsNotEmpty, IsString, MaxLength } from "class-validator";

export class LoginDto {
    @IsString()
    @IsNotEmpty()
    username!: string; // email

    @IsString()
    @IsNotEmpty()
    @MaxLength(72)
    password!: string;
}
