import { INestApplication } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { CATALOG_STORE, CatalogStore } from '../src/catalog/catalog-store';
import { CatalogModule } from '../src/catalog/catalog.module';
import { CATALOG_SEED, CatalogService } from '../src/catalog/catalog.service';
import { CommonModule } from '../src/common/common.module';
import { DomainExceptionFilter } from '../src/common/domain-exception.filter';
import { ProductNotFoundError, PublishError } from '../src/common/errors';
import { createValidationPipe } from '../src/common/validation';
import { OrderStatus } from '../src/database/entities';
import { EVENT_BUS, EventBus } from '../src/event-bus/event-bus';
import { EventBusModule } from '../src/event-bus/event-bus.module';
import { InMemoryEventBus } from '../src/event-bus/in-memory-event-bus';
import { CatalogClient } from '../src/order/catalog/catalog.client';
import { OrderController } from '../src/order/order.controller';
import { OrderService } from '../src/order/order.service';
import { OrderRepository } from '../src/order/repository/order.repository';
import { OutboxRelayService } from '../src/outbox/outbox-relay.service';
import { OutboxService } from '../src/outbox/outbox.service';
import { InMemoryOrderRepository } from './fakes/in-memory-order.repository';
import { InMemoryOutboxService } from './fakes/in-memory-outbox.service';
import { waitFor } from './utils/wait-for';

const testConfig = {
  EVENT_BUS_TRANSPORT: 'memory',
  MEMORY_BUS_PARTITIONS: 1,
  ORDERS_TOPIC: 'orders',
  PUBLISH_RETRY_ATTEMPTS: 2,
  PERSISTENCE_RETRY_ATTEMPTS: 1,
  RETRY_INITIAL_DELAY_MS: 0,
  OUTBOX_RELAY_INTERVAL_MS: 60_000,
  CATALOG_CONSUMER_GROUP: 'catalog-stock',
  CATALOG_CONSUMER_ENABLED: true,
  CONSUMER_RESTART_DELAY_MS: 10,
};

const orderRequest = {
  item_id: 1,
  name: 'James',
  address: '22 Bugs Bunny Street, London, E1 4AH, United Kingdom',
  quantity: 3,
};

/** An event bus whose broker never answers. */
const unreachableBus: EventBus = {
  publish: async topic => {
    throw new PublishError(`Timed out publishing to ${topic} after 5000ms`, true);
  },
  subscribe: (topic, options) => new InMemoryEventBus().subscribe(topic, options),
};

describe('Order and catalog services (e2e)', () => {
  let app: INestApplication;
  let orders: InMemoryOrderRepository;
  let store: CatalogStore;

  async function createApp(eventBus?: EventBus) {
    const outbox = new InMemoryOutboxService();
    orders = new InMemoryOrderRepository(outbox);

    let builder = Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true, load: [() => testConfig] }),
        ScheduleModule.forRoot(),
        CommonModule,
        EventBusModule,
        CatalogModule.withStore('memory'),
      ],
      controllers: [OrderController],
      providers: [
        OrderService,
        OutboxRelayService,
        { provide: OutboxService, useValue: outbox },
        { provide: OrderRepository, useValue: orders },
        {
          // Calls the catalog in process instead of over HTTP.
          provide: CatalogClient,
          useFactory: (catalog: CatalogService) => ({
            getStock: (itemId: number) =>
              catalog.getStock(itemId).catch((error: unknown) => {
                if (error instanceof ProductNotFoundError) return null;
                throw error;
              }),
          }),
          inject: [CatalogService],
        },
      ],
    })
      .overrideProvider(CATALOG_SEED)
      .useValue([{ id: 1, name: 'Widget', quantity: 10 }]);

    if (eventBus) {
      builder = builder.overrideProvider(EVENT_BUS).useValue(eventBus);
    }

    const moduleRef = await builder.compile();
    app = moduleRef.createNestApplication();
    app.useGlobalPipes(createValidationPipe());
    app.useGlobalFilters(new DomainExceptionFilter());
    await app.init();

    store = app.get<CatalogStore>(CATALOG_STORE);
  }

  afterEach(async () => {
    await app.close();
  });

  const fetchCatalog = async () => {
    const response = await request(app.getHttpServer()).get('/catalog').expect(200);
    return response.body;
  };

  describe('with a reachable event bus', () => {
    beforeEach(async () => {
      await createApp();
    });

    it('should decrement the catalog once the order event is consumed', async () => {
      const response = await request(app.getHttpServer()).post('/order').send(orderRequest).expect(201);

      expect(response.body.order_id).toMatch(/^[0-9a-f-]{36}$/);
      expect(response.body.status).toBe(OrderStatus.CREATED);

      await waitFor(async () => (await store.findProduct(1))?.quantity === 7);

      expect(await fetchCatalog()).toEqual([{ id: 1, name: 'Widget', quantity: 7 }]);
    });

    it.each([0, -1])('should reject quantity %i and leave the catalog unchanged', async quantity => {
      const response = await request(app.getHttpServer())
        .post('/order')
        .send({ ...orderRequest, quantity })
        .expect(400);

      expect(response.body.error).toBe('ValidationError');
      expect(response.body.message).toBe('quantity must not be less than 1');
      expect(orders.orders.size).toBe(0);
      expect(app.get<InMemoryEventBus>(EVENT_BUS).size('orders')).toBe(0);
      expect(await fetchCatalog()).toEqual([{ id: 1, name: 'Widget', quantity: 10 }]);
    });

    it('should apply a redelivered event only once', async () => {
      await request(app.getHttpServer()).post('/order').send(orderRequest).expect(201);
      await waitFor(async () => (await store.loadOffsets('catalog-stock', 'orders')).get(0) === '1');

      const bus = app.get<InMemoryEventBus>(EVENT_BUS);
      const [published] = bus.messages('orders');
      bus.appendRaw('orders', published.key, published.value, 0);
      await waitFor(async () => (await store.loadOffsets('catalog-stock', 'orders')).get(0) === '2');

      expect(await fetchCatalog()).toEqual([{ id: 1, name: 'Widget', quantity: 7 }]);
    });

    it('should reject an order for more than the available stock', async () => {
      const response = await request(app.getHttpServer())
        .post('/order')
        .send({ ...orderRequest, quantity: 11 })
        .expect(409);

      expect(response.body.message).toBe('Item 1 is out of stock: requested 11, available 10');
    });

    it('should reject an unknown item', async () => {
      const response = await request(app.getHttpServer())
        .post('/order')
        .send({ ...orderRequest, item_id: 42 })
        .expect(400);

      expect(response.body.message).toBe('item_id 42 is not a known catalog item');
    });

    it('should serve the stock of a single item', async () => {
      const response = await request(app.getHttpServer()).get('/catalog/stock/1').expect(200);
      expect(response.text).toBe('10');

      await request(app.getHttpServer()).get('/catalog/stock/2').expect(404);
    });

    it('should return a placed order by id', async () => {
      const placed = await request(app.getHttpServer()).post('/order').send(orderRequest).expect(201);

      const response = await request(app.getHttpServer()).get(`/order/${placed.body.order_id}`).expect(200);

      expect(response.body).toMatchObject({
        order_id: placed.body.order_id,
        item_id: 1,
        name: 'James',
        quantity: 3,
        status: OrderStatus.CREATED,
      });
    });
  });

  describe('with an unreachable event bus', () => {
    beforeEach(async () => {
      await createApp(unreachableBus);
    });

    it('should answer 503 and keep the order for a later retry', async () => {
      const response = await request(app.getHttpServer()).post('/order').send(orderRequest).expect(503);

      expect(response.body.error).toBe('PublishError');
      expect(response.body.ambiguous).toBe(true);
      expect(orders.orders.get(response.body.order_id)?.status).toBe(OrderStatus.CREATED);
      expect(await fetchCatalog()).toEqual([{ id: 1, name: 'Widget', quantity: 10 }]);
    });
  });
});
