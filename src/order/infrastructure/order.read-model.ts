import { ViewColumn, ViewEntity } from "typeorm";

// One row per order line; an order without lines yields a single row of nulls on the line side.
@ViewEntity({
  name: 'order_details',
  expression: `
    SELECT o.id AS order_id,
           o.customer_id AS customer_id,
           o.order_notes AS order_notes,
           o.order_time AS order_time,
           l.id AS line_id,
           m.id AS menu_item_id,
           m.dish_name AS dish_name,
           m.price AS price
      FROM customer_orders o
      LEFT JOIN ordered_items l ON l.order_id = o.id
      LEFT JOIN menu_items m ON m.id = l.menu_item_id
  `,
})
export class OrderReadModel {
  @ViewColumn({ name: 'order_id' })
  id!: number;

  @ViewColumn({ name: 'customer_id' })
  customerId!: number;

  @ViewColumn({ name: 'order_notes' })
  orderNotes!: string | null;

  // bigint and numeric arrive as strings from pg
  @ViewColumn({ name: 'order_time' })
  orderTime!: number | string;

  @ViewColumn({ name: 'line_id' })
  lineId!: number | null;

  @ViewColumn({ name: 'menu_item_id' })
  menuItemId!: number | null;

  @ViewColumn({ name: 'dish_name' })
  dishName!: string | null;

  @ViewColumn({ name: 'price' })
  price!: number | string | null;
}
