import {
  IsEmail,
  IsInt,
  IsOptional,
  IsString,
  Length,
  MaxLength,
  Min,
} from 'class-validator';

export class IngestLeadDto {
  @IsInt()
  @Min(1)
  @IsOptional()
  source_id?: number;

  @IsString()
  @Length(2, 128)
  @IsOptional()
  source_key?: string;

  @IsString()
  @MaxLength(128)
  @IsOptional()
  idempotency_key?: string;

  @IsString()
  @MaxLength(100)
  @IsOptional()
  source?: string;

  @IsString()
  @MaxLength(200)
  @IsOptional()
  name?: string;

  @IsEmail()
  @MaxLength(200)
  @IsOptional()
  email?: string;

  @IsString()
  @MaxLength(32)
  @IsOptional()
  phone?: string;

  @IsString()
  @Length(2, 2)
  @IsOptional()
  country_code?: string;

  @IsString()
  @MaxLength(16)
  @IsOptional()
  postal_code?: string;

  @IsString()
  @MaxLength(128)
  @IsOptional()
  city?: string;

  @IsString()
  @MaxLength(20)
  @IsOptional()
  region_code?: string;

  @IsString()
  @MaxLength(5000)
  @IsOptional()
  message?: string;

  @IsString()
  @MaxLength(100)
  @IsOptional()
  utm_source?: string;

  @IsString()
  @MaxLength(100)
  @IsOptional()
  utm_medium?: string;

  @IsString()
  @MaxLength(100)
  @IsOptional()
  utm_campaign?: string;
}
