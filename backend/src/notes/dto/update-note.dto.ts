import { PickType } from '@nestjs/mapped-types';
import { CreateNoteDto } from './create-note.dto';

/** Updates replace both fields, so the body rules are the same as on create. */
export class UpdateNoteDto extends PickType(CreateNoteDto, ['title', 'note'] as const) {}
