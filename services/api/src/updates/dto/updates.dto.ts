import { IsBoolean, IsEnum, IsNotEmpty, IsOptional, IsString, Matches, MaxLength, ValidateIf } from 'class-validator';
import { ArtifactKind } from '@tidewater/shared';

export class NegotiateDto {
  @IsOptional()
  @IsBoolean()
  force?: boolean;
}

export class DownloadDto {
  @IsEnum(ArtifactKind)
  kind!: ArtifactKind;

  /** Plugin or theme code; ignored for the core */
  @ValidateIf((dto: DownloadDto) => dto.kind !== ArtifactKind.CORE)
  @IsString()
  @IsNotEmpty()
  @Matches(/^[A-Za-z0-9_]+\.[A-Za-z0-9_]+$/, { message: 'code must look like Author.Name' })
  code?: string;

  @IsString()
  @Matches(/^[a-f0-9]{32}$/i, { message: 'hash must be an md5 hex digest' })
  hash!: string;

  @IsOptional()
  @IsBoolean()
  installation?: boolean;
}

export class RollbackDto {
  @IsOptional()
  @IsString()
  @MaxLength(50)
  version?: string;
}
