import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { UpdateInvoiceDto } from '../../invoices/dto/update-invoice.dto';
import { UpdateQuotationDto } from '../../quotations/dto/update-quotation.dto';
import { UpdateRecurringDto } from '../../recurring/dto/update-recurring.dto';

async function failingProperties<T extends object>(
  cls: new () => T,
  body: Record<string, unknown>,
): Promise<string[]> {
  const errors = await validate(plainToInstance(cls, body));
  return errors.map((e) => e.property).sort();
}

describe('update DTOs', () => {
  test('invoice header: omitted fields and clearable nulls pass', async () => {
    await expect(failingProperties(UpdateInvoiceDto, {})).resolves.toEqual([]);
    await expect(
      failingProperties(UpdateInvoiceDto, { dueDate: null, notes: null }),
    ).resolves.toEqual([]);
  });

  test('invoice header: null on required columns is rejected', async () => {
    await expect(
      failingProperties(UpdateInvoiceDto, { invoiceDate: null, customerId: null }),
    ).resolves.toEqual(['customerId', 'invoiceDate']);
  });

  test('quotation header', async () => {
    await expect(
      failingProperties(UpdateQuotationDto, { validUntil: null, notes: null }),
    ).resolves.toEqual([]);
    await expect(
      failingProperties(UpdateQuotationDto, { quotationDate: null, customerId: null }),
    ).resolves.toEqual(['customerId', 'quotationDate']);
  });

  test('recurring schedule', async () => {
    await expect(
      failingProperties(UpdateRecurringDto, { endDate: null, notes: null }),
    ).resolves.toEqual([]);
    await expect(
      failingProperties(UpdateRecurringDto, {
        frequency: null,
        isActive: null,
        items: null,
      }),
    ).resolves.toEqual(['frequency', 'isActive', 'items']);
  });
});
