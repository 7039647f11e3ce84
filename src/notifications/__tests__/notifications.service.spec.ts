import { Logger, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Notification } from '../entities/notification.entity';
import { NotificationsService } from '../notifications.service';

const mockNotifications = {
  insert: jest.fn(),
  find: jest.fn(),
  findOne: jest.fn(),
  update: jest.fn(),
};

describe('NotificationsService', () => {
  let service: NotificationsService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        NotificationsService,
        { provide: getRepositoryToken(Notification), useValue: mockNotifications },
      ],
    }).compile();

    service = module.get<NotificationsService>(NotificationsService);
    jest.clearAllMocks();
  });

  afterEach(() => jest.restoreAllMocks());

  it('stores an unread notification', async () => {
    mockNotifications.insert.mockResolvedValue({});
    await service.notify({
      ownerId: 'owner-1',
      type: 'invoice_paid',
      title: 'Invoice paid',
      message: 'Invoice INV-0001 is fully paid.',
      entityType: 'invoice',
      entityId: 1,
    });
    expect(mockNotifications.insert).toHaveBeenCalledWith({
      ownerId: 'owner-1',
      type: 'invoice_paid',
      title: 'Invoice paid',
      message: 'Invoice INV-0001 is fully paid.',
      entityType: 'invoice',
      entityId: 1,
      isRead: false,
    });
  });

  it('drops the notification with a warning when the store fails', async () => {
    mockNotifications.insert.mockRejectedValue(new Error('timeout'));
    const warn = jest
      .spyOn(Logger.prototype, 'warn')
      .mockImplementation(() => undefined);

    await expect(
      service.notify({
        ownerId: 'owner-1',
        type: 'payment_received',
        title: 'Payment received',
        message: 'A payment of 10.00 was recorded for invoice INV-0001.',
      }),
    ).resolves.toBeUndefined();
    expect(warn).toHaveBeenCalledWith(
      "Notification 'payment_received' for owner owner-1 dropped: timeout",
    );
  });

  it('markRead is scoped by owner', async () => {
    mockNotifications.findOne.mockResolvedValue(null);
    await expect(service.markRead('owner-2', 5)).rejects.toBeInstanceOf(
      NotFoundException,
    );
    expect(mockNotifications.update).not.toHaveBeenCalled();
  });

  it('markRead flags an unread notification once', async () => {
    mockNotifications.findOne.mockResolvedValue({ id: 5, ownerId: 'owner-1', isRead: false });
    mockNotifications.update.mockResolvedValue({});

    const result = await service.markRead('owner-1', 5);
    expect(result.isRead).toBe(true);
    expect(mockNotifications.update).toHaveBeenCalledWith({ id: 5 }, { isRead: true });
  });
});
