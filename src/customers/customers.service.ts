// src/customers/customers.service.ts
import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { AuditService } from '../audit/audit.service';
import { CreateCustomerDto } from './dto/create-customer.dto';
import { Customer } from './entities/customer.entity';

@Injectable()
export class CustomersService {
  constructor(
    @InjectRepository(Customer)
    private readonly customers: Repository<Customer>,
    private readonly audit: AuditService,
  ) {}

  list(ownerId: string) {
    return this.customers.find({
      where: { ownerId },
      order: { companyName: 'ASC' },
    });
  }

  findOne(ownerId: string, id: number) {
    return this.findOwned(this.customers.manager, ownerId, id);
  }

  /**
   * Cliente del propietario dentro del manager dado (transacción o no).
   * Un cliente ajeno responde igual que uno inexistente.
   */
  async findOwned(
    manager: EntityManager,
    ownerId: string,
    id: number,
  ): Promise<Customer> {
    const customer = await manager.findOne(Customer, {
      where: { id, ownerId },
    });
    if (!customer) throw new NotFoundException('Customer not found');
    return customer;
  }

  async create(ownerId: string, dto: CreateCustomerDto): Promise<Customer> {
    const customer = await this.customers.save(
      this.customers.create({
        ownerId,
        companyName: dto.companyName.trim(),
        contactName: dto.contactName ?? null,
        email: dto.email ?? null,
        phone: dto.phone ?? null,
        address: dto.address ?? null,
        taxNumber: dto.taxNumber?.trim() || null,
      }),
    );
    await this.audit.record({
      ownerId,
      action: 'create',
      entityType: 'customer',
      entityId: customer.id,
      description: `Customer '${customer.companyName}' created`,
    });
    return customer;
  }
}
