import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SqlMenuItemRepository } from './infrastructure/sql-menu-item.repository';
import { MenuItemWriteModel } from './infrastructure/menu-item.write-model';
import { MenuItemController } from './menu-item.controller';
import { MENU_ITEM_REPOSITORY, MenuItemService } from './menu-item.service';

@Module({
  imports: [TypeOrmModule.forFeature([MenuItemWriteModel])],
  providers: [
    MenuItemService,
    {
      provide: MENU_ITEM_REPOSITORY,
      useClass: SqlMenuItemRepository,
    },
  ],
  controllers: [MenuItemController],
})
export class MenuItemModule {}
