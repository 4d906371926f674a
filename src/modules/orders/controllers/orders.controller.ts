import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import {
  Caller,
  CurrentCaller,
  PermissionsGuard,
  RequirePermissions,
} from '../../../core/auth';
import { TimeoutInterceptor } from '../../../core/timeout/timeout.interceptor';
import {
  CreateOrderResponse,
  MessageResponse,
  OrderResponse,
} from '../dto/order-response.dto';
import { OrdersQueryDto } from '../dto/orders-query.dto';
import { OrderMapper } from '../mappers/order.mapper';
import { OrdersService } from '../services/orders.service';

@Controller('orders')
@UseGuards(PermissionsGuard)
@UseInterceptors(TimeoutInterceptor)
export class OrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @RequirePermissions('read')
  async createOrder(
    @CurrentCaller() caller: Caller,
  ): Promise<CreateOrderResponse> {
    const { order, excludedMovieIds } = await this.ordersService.createOrder(
      caller.userId,
    );
    return OrderMapper.toCreateResponse(order, excludedMovieIds);
  }

  @Get()
  @RequirePermissions('read')
  async getMyOrders(@CurrentCaller() caller: Caller): Promise<OrderResponse[]> {
    const orders = await this.ordersService.getUserOrders(caller.userId);
    return orders.map((order) => OrderMapper.toResponse(order));
  }

  @Get('admin')
  @RequirePermissions('admin')
  async getAllOrders(@Query() query: OrdersQueryDto): Promise<OrderResponse[]> {
    const orders = await this.ordersService.getAllOrders({
      userId: query.userId,
      dateFrom: query.dateFrom,
      dateTo: query.dateTo,
      status: query.status,
    });
    return orders.map((order) => OrderMapper.toResponse(order));
  }

  @Post(':orderId/cancel')
  @HttpCode(HttpStatus.OK)
  @RequirePermissions('read')
  async cancelOrder(
    @CurrentCaller() caller: Caller,
    @Param('orderId', ParseIntPipe) orderId: number,
  ): Promise<MessageResponse> {
    await this.ordersService.cancelOrder(orderId, caller.userId);
    return { message: 'Your order is successfully canceled.' };
  }
}
