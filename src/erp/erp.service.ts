import { BadRequestException, Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { OrderErrors } from '../common/errors/order.errors';
import { touchedAt } from '../common/utils/timestamp';
import { Store } from '../storage/store';
import { ORDER_STORE } from '../storage/storage.tokens';
import { CreateOrderDto } from './dto/create-order.dto';
import { isOrderStatus, Order, OrderStatus } from './order.entity';

const TOTAL_TOLERANCE = 0.01;

function orderDatePrefix(now: Date): string {
  const yyyy = now.getFullYear();
  const mm = String(now.getMonth() + 1).padStart(2, '0');
  const dd = String(now.getDate()).padStart(2, '0');
  return `ORD-${yyyy}${mm}${dd}`;
}

@Injectable()
export class ErpService {
  private readonly logger = new Logger(ErpService.name);

  constructor(
    @Inject(ORDER_STORE)
    private readonly orders: Store<Order>,
  ) {}

  async createOrder(dto: CreateOrderDto): Promise<Order> {
    if (!Array.isArray(dto.items) || dto.items.length === 0) {
      throw new BadRequestException(OrderErrors.ORDER_MUST_HAVE_ITEMS);
    }
    if (typeof dto.total_amount !== 'number' || !(dto.total_amount > 0)) {
      throw new BadRequestException(OrderErrors.ORDER_INVALID_AMOUNT);
    }

    const itemsTotal = dto.items.reduce((sum, item) => sum + item.quantity * item.price, 0);
    if (Math.abs(dto.total_amount - itemsTotal) > TOTAL_TOLERANCE) {
      throw new BadRequestException({
        ...OrderErrors.ORDER_TOTAL_MISMATCH,
        details: { total_amount: dto.total_amount, items_total: itemsTotal },
      });
    }

    const order = await this.orders.update((orders) => {
      const now = new Date();
      const timestamp = now.toISOString();
      const created: Order = {
        id: this.nextOrderId(orders, now),
        client_id: dto.client_id,
        items: dto.items.map(({ name, quantity, price }) => ({ name, quantity, price })),
        total_amount: dto.total_amount,
        status: 'pending',
        description: dto.description ?? '',
        priority: dto.priority ?? 'medium',
        ...(dto.notes !== undefined && { notes: dto.notes }),
        created_at: timestamp,
        updated_at: timestamp,
      };
      orders.push(created);
      return created;
    });

    this.logger.log(`order_created | id=${order.id} | client=${order.client_id} | total=${order.total_amount}`);
    return order;
  }

  async getOrderById(orderId: string): Promise<Order> {
    const orders = await this.orders.load();
    const order = orders.find((o) => o.id === orderId);
    if (!order) {
      throw new NotFoundException(OrderErrors.ORDER_NOT_FOUND);
    }
    return order;
  }

  async updateOrderStatus(orderId: string, newStatus: string): Promise<Order> {
    if (!isOrderStatus(newStatus)) {
      throw new BadRequestException(OrderErrors.ORDER_INVALID_STATUS);
    }

    const order = await this.orders.update((orders) => {
      const index = orders.findIndex((o) => o.id === orderId);
      if (index === -1) {
        throw new NotFoundException(OrderErrors.ORDER_NOT_FOUND);
      }
      const updated: Order = {
        ...orders[index],
        status: newStatus,
        updated_at: touchedAt(orders[index].updated_at),
      };
      orders[index] = updated;
      return updated;
    });

    this.logger.log(`order_status_updated | id=${orderId} | status=${newStatus}`);
    return order;
  }

  listAllOrders(): Promise<Order[]> {
    return this.orders.load();
  }

  async listOrdersByStatus(status: OrderStatus): Promise<Order[]> {
    if (!isOrderStatus(status)) {
      throw new BadRequestException(OrderErrors.ORDER_INVALID_STATUS);
    }
    const orders = await this.orders.load();
    return orders.filter((o) => o.status === status);
  }

  private nextOrderId(orders: Order[], now: Date): string {
    const prefix = orderDatePrefix(now);
    const taken = new Set(orders.map((o) => o.id));
    let counter = 1;
    while (taken.has(`${prefix}-${String(counter).padStart(3, '0')}`)) {
      counter += 1;
    }
    return `${prefix}-${String(counter).padStart(3, '0')}`;
  }
}
