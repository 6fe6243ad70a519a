import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, Put } from '@nestjs/common';
import { NotesService } from './notes.service';
import { CreateNoteDto } from './dto/create-note.dto';
import { UpdateNoteDto } from './dto/update-note.dto';
import { Owner } from './owner.decorator';

@Controller('notes')
export class NotesController {
  constructor(private readonly notesService: NotesService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(@Owner() owner: string, @Body() createNoteDto: CreateNoteDto) {
    return this.notesService.create(owner, createNoteDto);
  }

  @Get()
  async findAll(@Owner() owner: string) {
    return this.notesService.findAll(owner);
  }

  @Get(':id')
  async findOne(@Owner() owner: string, @Param('id') id: string) {
    return this.notesService.findOne(owner, id);
  }

  @Put(':id')
  async update(@Owner() owner: string, @Param('id') id: string, @Body() updateNoteDto: UpdateNoteDto) {
    return this.notesService.update(owner, id, updateNoteDto);
  }

  @Delete(':id')
  async remove(@Owner() owner: string, @Param('id') id: string) {
    return this.notesService.remove(owner, id);
  }
}
