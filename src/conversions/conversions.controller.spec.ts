import { Test, TestingModule } from '@nestjs/testing';

import { ConversionsController } from './conversions.controller';
import { ConversionsModule } from './conversions.module';
import { createTestConfig } from '../../test/helpers/config';
import { FakeSourceAdapter } from '../../test/helpers/sources';
import { AppConfigService } from '../config';
import { SourceName } from '../sources/source-name.enum';
import { SOURCE_ADAPTERS } from '../sources/sources.providers';

describe('ConversionsController', () => {
  let moduleRef: TestingModule;
  let controller: ConversionsController;

  beforeEach(async () => {
    const source = FakeSourceAdapter.returning(SourceName.FRANKFURTER, {
      BRL: '5.07',
      EUR: '0.92',
    });

    moduleRef = await Test.createTestingModule({ imports: [ConversionsModule] })
      .overrideProvider(AppConfigService)
      .useValue(createTestConfig())
      .overrideProvider(SOURCE_ADAPTERS)
      .useValue([source])
      .compile();

    controller = moduleRef.get(ConversionsController);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('converts and serializes dates', async () => {
    const conversion = await controller.convert({
      amount: 25,
      from: 'USD',
      to: 'EUR',
    });

    expect(conversion).toMatchObject({
      amount: '25',
      origin: 'USD',
      destination: 'EUR',
      result: '23.00',
      rate: '0.92',
      source: SourceName.FRANKFURTER,
    });
    expect(conversion.createdAt).toEqual(expect.any(String));
  });

  it('lists saved conversions and batch members in history', async () => {
    await controller.convert({ amount: 1, from: 'USD', to: 'EUR', save: false });
    await controller.convert({ amount: 2, from: 'USD', to: 'EUR' });
    const batch = await controller.convertBatch({
      amount: 3,
      from: 'USD',
      to: ['BRL'],
    });

    const history = await controller.getHistory({ origin: 'USD' });

    expect(history.total).toBe(2);
    expect(
      history.items.map(({ amount, destination, batchId }) => [
        amount,
        destination,
        batchId,
      ]),
    ).toEqual([
      ['3', 'BRL', batch.id],
      ['2', 'EUR', undefined],
    ]);
    await expect(controller.clearHistory()).resolves.toEqual({ removed: 2 });
  });
});
