import { IsIn, IsInt, IsOptional, ValidateIf } from 'class-validator';
import { KEY_TYPES, KeyType, RSA_KEY_SIZES } from '../job-spec';

export class CreateKeygenRequestDto {
  @IsOptional()
  @IsIn([...KEY_TYPES])
  key_type?: KeyType;

  /** Only checked for rsa; ed25519 ignores it. Null means the default. */
  @ValidateIf((dto: CreateKeygenRequestDto) => dto.key_type !== 'ed25519' && dto.key_bits != null)
  @IsInt()
  @IsIn([...RSA_KEY_SIZES])
  key_bits?: number | null;
}
