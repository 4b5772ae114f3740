import { EventBatch, EventSubscription } from '../event-bus';
import { InMemoryEventBus, partitionForKey } from '../in-memory-event-bus';

async function nextBatch(subscription: EventSubscription): Promise<EventBatch | undefined> {
  const result = await subscription[Symbol.asyncIterator]().next();
  return result.done ? undefined : result.value;
}

describe('InMemoryEventBus', () => {
  it('should acknowledge a publish with its partition and offset', async () => {
    const bus = new InMemoryEventBus(1);

    expect(await bus.publish('orders', { key: '1', value: { orderId: 'a' } })).toEqual({ topic: 'orders', partition: 0, offset: '0' });
    expect(await bus.publish('orders', { key: '1', value: { orderId: 'b' } })).toEqual({ topic: 'orders', partition: 0, offset: '1' });
    expect(bus.size('orders')).toBe(2);
  });

  it('should keep messages with the same key in one partition', async () => {
    const bus = new InMemoryEventBus(3);

    const first = await bus.publish('orders', { key: '42', value: 1 });
    const second = await bus.publish('orders', { key: '42', value: 2 });

    expect(first.partition).toBe(partitionForKey('42', 3));
    expect(second.partition).toBe(first.partition);
    expect(second.offset).toBe('1');
  });

  it('should store the JSON encoding of the value and the headers', async () => {
    const bus = new InMemoryEventBus(1);

    await bus.publish('orders', { key: '1', value: { orderId: 'a' }, headers: { 'event-type': 'OrderPlaced' } });

    const [message] = bus.messages('orders');
    expect(message.value).toBe('{"orderId":"a"}');
    expect(message.headers).toEqual({ 'event-type': 'OrderPlaced' });
  });

  it('should fetch nothing until iterated and resume from the given offset', async () => {
    const bus = new InMemoryEventBus(1);
    await bus.publish('orders', { key: '1', value: 'a' });
    await bus.publish('orders', { key: '1', value: 'b' });
    await bus.publish('orders', { key: '1', value: 'c' });

    const subscription = bus.subscribe('orders', { groupId: 'g', fromOffsets: new Map([[0, '1']]), maxBatchSize: 1 });

    const first = await nextBatch(subscription);
    const second = await nextBatch(subscription);

    expect(first?.messages.map(message => message.value)).toEqual(['"b"']);
    expect(first?.nextOffset).toBe('2');
    expect(second?.messages.map(message => message.value)).toEqual(['"c"']);
    expect(second?.nextOffset).toBe('3');
    await subscription.close();
  });

  it('should wake a waiting reader when a message arrives', async () => {
    const bus = new InMemoryEventBus(1);
    const subscription = bus.subscribe('orders', { groupId: 'g' });

    const pending = nextBatch(subscription);
    await bus.publish('orders', { key: '1', value: 'a' });

    expect((await pending)?.messages).toHaveLength(1);
    await subscription.close();
  });

  it('should end iteration when closed', async () => {
    const bus = new InMemoryEventBus(1);
    const subscription = bus.subscribe('orders', { groupId: 'g' });

    const pending = nextBatch(subscription);
    await subscription.close();

    expect(await pending).toBeUndefined();
  });

  it('should deliver raw values untouched', async () => {
    const bus = new InMemoryEventBus(2);
    bus.appendRaw('orders', null, 'not json', 1);

    const subscription = bus.subscribe('orders', { groupId: 'g' });
    const batch = await nextBatch(subscription);

    expect(batch?.partition).toBe(1);
    expect(batch?.messages[0]).toMatchObject({ offset: '0', key: null, value: 'not json' });
    await subscription.close();
  });
});
