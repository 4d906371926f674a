import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
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
import { AddMovieDto } from '../dto/add-movie.dto';
import { CartItemResponse, CartResponse } from '../dto/cart-response.dto';
import { CartService } from '../services/cart.service';

@Controller('cart')
@UseGuards(PermissionsGuard)
@UseInterceptors(TimeoutInterceptor)
@RequirePermissions('cart')
export class CartController {
  constructor(private readonly cartService: CartService) {}

  @Post('add-movie')
  @HttpCode(HttpStatus.CREATED)
  async addMovie(
    @CurrentCaller() caller: Caller,
    @Body() body: AddMovieDto,
  ): Promise<CartItemResponse> {
    return this.cartService.addMovie(caller.userId, body.movieId);
  }

  @Delete('remove-movie/:movieId')
  async removeMovie(
    @CurrentCaller() caller: Caller,
    @Param('movieId', ParseIntPipe) movieId: number,
  ): Promise<CartItemResponse> {
    return this.cartService.removeMovie(caller.userId, movieId);
  }

  @Get('my-cart')
  async getMyCart(@CurrentCaller() caller: Caller): Promise<CartResponse> {
    return this.cartService.getCart(caller.userId);
  }

  @Delete()
  @HttpCode(HttpStatus.NO_CONTENT)
  async clear(@CurrentCaller() caller: Caller): Promise<void> {
    await this.cartService.clear(caller.userId);
  }
}
