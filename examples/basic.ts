import { DisposeBag, hibiki, filter, map, skipRepeats, withPrevious } from '../src/index';

function basicExample() {
  console.log('🔔 Hibiki Basic Examples\n');

  // Example 1: Hot channel, only attached listeners hear a value
  console.log('1️⃣ Hot:');
  const [hotEmitter, hot] = hibiki.hot<number>();
  hotEmitter.broadcast(1); // nobody listening, dropped
  const hotSubscription = hot.listen((value) => console.log('hot got', value));
  hotEmitter.broadcast(2); // hot got 2
  hotSubscription.dispose();

  // Example 2: Warm channel replays the latest values
  console.log('\n2️⃣ Warm:');
  const [warmEmitter, warm] = hibiki.warm<string>(2);
  ['a', 'b', 'c'].forEach((v) => warmEmitter.broadcast(v));
  warm.listen((value) => console.log('warm got', value)); // b, c

  // Example 3: Derived channels over a cold source
  console.log('\n3️⃣ Operators:');
  const [priceEmitter, prices] = hibiki.cold<number>({ label: 'prices' });
  [100, 100, 101, 99, 99, 104].forEach((p) => priceEmitter.broadcast(p));

  const moves = prices.pipe(
    skipRepeats(),
    withPrevious(),
    filter((pair: [number | undefined, number]) => pair[0] !== undefined),
    map(([previous, current]: [number | undefined, number]) => current - (previous ?? current))
  );
  moves.listen((delta) => console.log('move', delta)); // 1, -2, 5

  // Example 4: Scoped subscriptions
  console.log('\n4️⃣ Scope:');
  DisposeBag.scope((bag) => {
    prices.listen((p) => console.log('in scope', p)).disposed(bag);
    priceEmitter.broadcast(110);
  });
  priceEmitter.broadcast(111); // nothing printed from the scope

  console.log('\n✅ Done');
}

basicExample();
