import { Transform } from 'class-transformer';
import { IsNotEmpty, IsString } from 'class-validator';

const trim = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);

export class CreateNoteDto {
  @Transform(trim)
  @IsString()
  @IsNotEmpty({ message: 'title is required' })
  title!: string;

  @Transform(trim)
  @IsString()
  @IsNotEmpty({ message: 'note is required' })
  note!: string;
}
