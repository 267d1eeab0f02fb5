import { IsEmail, IsString, Length, Matches, MaxLength, MinLength } from "class-validator";

export class RegisterDto {
    @IsString()
    @Length(2, 100)
    name!: string;

    @IsEmail()
    email!: string;

    @IsString()
    @MinLength(8)
    @MaxLength(72)
    @Matches(/^(?=.*[A-Za-z])(?=.*\d).+$/, {
        message: "Password must contain at least one letter and one number",
    })
    password!: string;
}
