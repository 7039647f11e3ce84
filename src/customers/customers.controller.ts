// src/customers/customers.controller.ts
import {
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Post,
} from '@nestjs/common';
import { CurrentOwner } from '../auth/current-owner.decorator';
import { CustomersService } from './customers.service';
import { CreateCustomerDto } from './dto/create-customer.dto';

@Controller('customers')
export class CustomersController {
  constructor(private readonly customers: CustomersService) {}

  @Get()
  list(@CurrentOwner() ownerId: string) {
    return this.customers.list(ownerId);
  }

  @Get(':id')
  findOne(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.customers.findOne(ownerId, id);
  }

  @Post()
  create(@CurrentOwner() ownerId: string, @Body() dto: CreateCustomerDto) {
    return this.customers.create(ownerId, dto);
  }
}
