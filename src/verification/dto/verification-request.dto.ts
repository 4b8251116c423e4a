import { Transform } from "class-transformer";
import { IsNotEmpty, IsOptional, IsString, MaxLength } from "class-validator";

const trimmed = ({ value }: { value: unknown }): unknown =>
  typeof value === "string" ? value.trim() : value;

export class CollegeIdVerificationDto {
  @Transform(trimmed)
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  fullName!: string;

  @Transform(trimmed)
  @IsOptional()
  @IsString()
  @MaxLength(64)
  rollNumber?: string;
}

export class CertificateVerificationDto {
  @Transform(trimmed)
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  fullName!: string;

  @Transform(trimmed)
  @IsOptional()
  @IsString()
  @MaxLength(200)
  skillLabel?: string;

  /** `"<institution> - <skill/achievement>"` */
  @Transform(trimmed)
  @IsOptional()
  @IsString()
  @MaxLength(1000)
  description?: string;
}
