import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, Put } from '@nestjs/common';
import { IdSchema, ZodValidationPipe } from '../common/zod-validation.pipe';
import {
  CreateMenuItemInput,
  CreateMenuItemSchema,
  MenuItemReadDto,
  UpdateMenuItemInput,
  UpdateMenuItemSchema,
} from './menu-item.dto';
import { MenuItemService } from './menu-item.service';

@Controller('items')
export class MenuItemController {
  constructor(private readonly menuItemService: MenuItemService) {}

  @Post()
  create(@Body(new ZodValidationPipe(CreateMenuItemSchema)) body: CreateMenuItemInput): Promise<MenuItemReadDto> {
    return this.menuItemService.create(body);
  }

  @Get(':id')
  findById(@Param('id', new ZodValidationPipe(IdSchema)) id: number): Promise<MenuItemReadDto> {
    return this.menuItemService.findById(id);
  }

  @Put(':id')
  update(
    @Param('id', new ZodValidationPipe(IdSchema)) id: number,
    @Body(new ZodValidationPipe(UpdateMenuItemSchema)) body: UpdateMenuItemInput,
  ): Promise<MenuItemReadDto> {
    return this.menuItemService.update(id, body);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  delete(@Param('id', new ZodValidationPipe(IdSchema)) id: number): Promise<void> {
    return this.menuItemService.delete(id);
  }
}
