import { NumberingService } from '../numbering/numbering.service';
import {
  BillingTestContext,
  OTHER_OWNER,
  OWNER,
  createBillingTestingModule,
} from '../../__tests__/testing-module';

describe('NumberingService', () => {
  let ctx: BillingTestContext;
  let numbering: NumberingService;

  beforeEach(async () => {
    ctx = await createBillingTestingModule();
    numbering = ctx.moduleRef.get(NumberingService);
  });

  afterEach(() => ctx.close());

  const next = (ownerId: string, kind: 'invoice' | 'quotation', date: string) =>
    ctx.dataSource.transaction((manager) =>
      numbering.next(manager, ownerId, kind, date),
    );

  test('invoice numbers are sequential per owner', async () => {
    expect(await next(OWNER, 'invoice', '2026-03-15')).toBe('INV-0001');
    expect(await next(OWNER, 'invoice', '2026-03-16')).toBe('INV-0002');
    expect(await next(OTHER_OWNER, 'invoice', '2026-03-16')).toBe('INV-0001');
  });

  test('invoice series does not restart with the year', async () => {
    expect(await next(OWNER, 'invoice', '2026-12-31')).toBe('INV-0001');
    expect(await next(OWNER, 'invoice', '2027-01-01')).toBe('INV-0002');
  });

  test('quotation numbers restart every calendar year', async () => {
    expect(await next(OWNER, 'quotation', '2026-05-01')).toBe('QUO-2026-0001');
    expect(await next(OWNER, 'quotation', '2026-06-01')).toBe('QUO-2026-0002');
    expect(await next(OWNER, 'quotation', '2027-01-02')).toBe('QUO-2027-0001');
  });

  test('peek previews without consuming', async () => {
    expect(await numbering.peek(OWNER, 'invoice', '2026-03-15')).toBe('INV-0001');
    await next(OWNER, 'invoice', '2026-03-15');
    expect(await numbering.peek(OWNER, 'invoice', '2026-03-15')).toBe('INV-0002');
    expect(await numbering.peek(OWNER, 'invoice', '2026-03-15')).toBe('INV-0002');
    expect(await next(OWNER, 'invoice', '2026-03-15')).toBe('INV-0002');
  });

  test('a rolled back transaction releases the number', async () => {
    await next(OWNER, 'invoice', '2026-03-15');
    await expect(
      ctx.dataSource.transaction(async (manager) => {
        await numbering.next(manager, OWNER, 'invoice', '2026-03-15');
        throw new Error('abort');
      }),
    ).rejects.toThrow('abort');
    expect(await next(OWNER, 'invoice', '2026-03-15')).toBe('INV-0002');
  });
});
