import { Test, TestingModule } from '@nestjs/testing';
import { getLoggerToken } from 'nestjs-pino';
import { MemoryMerchantStore, parseMerchantSeed } from '../storage/memory/memory-merchant.store';
import { MerchantStore } from './merchant.store';
import { MerchantsService } from './merchants.service';
import { MerchantStatus } from './types/merchant.types';

describe('MerchantsService', () => {
  let service: MerchantsService;

  const mockLogger = {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MerchantsService,
        {
          provide: MerchantStore,
          useValue: new MemoryMerchantStore(
            parseMerchantSeed([
              { merchantId: 'M123', name: 'Demo Store', salt: 'test-salt', status: 'ACTIVE' },
              { merchantId: 'M999', name: 'Closed Store', salt: 'test-salt', status: 'INACTIVE' },
            ]),
          ),
        },
        { provide: getLoggerToken(MerchantsService.name), useValue: mockLogger },
      ],
    }).compile();

    service = module.get<MerchantsService>(MerchantsService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('findActive', () => {
    it('should return an active merchant', async () => {
      expect(await service.findActive('M123')).toEqual({
        merchantId: 'M123',
        name: 'Demo Store',
        salt: 'test-salt',
        status: MerchantStatus.ACTIVE,
      });
    });

    it('should hide an inactive merchant', async () => {
      expect(await service.findActive('M999')).toBeNull();
      expect(mockLogger.warn).toHaveBeenCalledWith(
        { merchantId: 'M999', status: MerchantStatus.INACTIVE },
        'Merchant is not active',
      );
    });

    it('should return null for unknown or blank ids', async () => {
      expect(await service.findActive('NOPE')).toBeNull();
      expect(await service.findActive('')).toBeNull();
      expect(await service.findActive(undefined)).toBeNull();
    });
  });

  describe('parseMerchantSeed', () => {
    it('should reject entries with an unknown status', () => {
      expect(() =>
        parseMerchantSeed([{ merchantId: 'M1', name: 'x', salt: 'test-salt', status: 'PAUSED' }]),
      ).toThrow('Invalid merchant seed entry 0: status must be ACTIVE or INACTIVE');
    });

    it('should reject a seed that is not an array', () => {
      expect(() => parseMerchantSeed({ merchantId: 'M1' })).toThrow('Merchant seed must be a JSON array');
    });
  });
});
