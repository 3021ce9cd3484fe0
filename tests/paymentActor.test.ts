import { PaymentActor } from "../src/services/paymentActor";
import { PaymentStatus, SessionDeleted } from "../src/dtos/session.dto";
import { IFeeCalculator } from "../src/interfaces/feeCalculator";

const T0 = 1_700_000_000_000;
const MIN = 60_000;

let clock: number;
let payment: PaymentActor;

const pay = (licensePlate: string) =>
  payment.ask<PaymentStatus>(replyTo => ({ type: 'Pay', licensePlate, replyTo }));
const check = (licensePlate: string) =>
  payment.ask<PaymentStatus>(replyTo => ({ type: 'CheckOnLeave', licensePlate, replyTo }));
const enter = (licensePlate: string, entryTimestamp: number) =>
  payment.tell({ type: 'CarEntered', licensePlate, entryTimestamp });

beforeEach(() => {
  clock = T0;
  payment = new PaymentActor({ askTimeoutMs: 1000, now: () => clock });
});

afterEach(() => {
  payment.stop();
});

test('pays 200 cents after 45 minutes at 200 cents per hour', async () => {
  enter('ABC123', T0);
  clock = T0 + 45 * MIN;

  expect(await pay('ABC123')).toEqual({
    licensePlate: 'ABC123',
    paid: true,
    entryTimestamp: T0,
    currentTimestamp: T0 + 45 * MIN,
    priceCents: 200,
  });
});

test('paying at the entry instant costs nothing', async () => {
  enter('ABC123', T0);
  const status = await pay('ABC123');
  expect(status.priceCents).toBe(0);
  expect(status.paid).toBe(true);
});

test('unknown plate answers with an unpaid zero status', async () => {
  expect(await pay('UNKNOWN')).toEqual({
    licensePlate: 'UNKNOWN',
    paid: false,
    entryTimestamp: 0,
    currentTimestamp: T0,
    priceCents: 0,
  });
  expect(await check('UNKNOWN')).toMatchObject({ paid: false, priceCents: 0, entryTimestamp: 0 });
});

test('check on leave quotes the fee without marking paid', async () => {
  enter('ABC123', T0);
  clock = T0 + 20 * MIN;

  expect(await check('ABC123')).toMatchObject({ paid: false, priceCents: 100 });
  expect((await pay('ABC123')).paid).toBe(true);
  expect(await check('ABC123')).toMatchObject({ paid: true, priceCents: 100 });
});

test('paying again recomputes the fee at the current time', async () => {
  enter('ABC123', T0);
  clock = T0 + 45 * MIN;
  expect((await pay('ABC123')).priceCents).toBe(200);

  clock = T0 + 75 * MIN;
  const again = await pay('ABC123');
  expect(again.paid).toBe(true);
  expect(again.priceCents).toBe(300);
});

test('re-entry without exit replaces the previous session', async () => {
  enter('ABC123', T0);
  clock = T0 + 10 * MIN;
  await pay('ABC123');

  enter('ABC123', T0 + 60 * MIN);
  clock = T0 + 90 * MIN;
  expect(await check('ABC123')).toEqual({
    licensePlate: 'ABC123',
    paid: false,
    entryTimestamp: T0 + 60 * MIN,
    currentTimestamp: T0 + 90 * MIN,
    priceCents: 100,
  });
});

test('exit removes the session and is acknowledged either way', async () => {
  enter('ABC123', T0);
  const del = (licensePlate: string) =>
    payment.ask<SessionDeleted>(replyTo => ({ type: 'DeleteOnExit', licensePlate, replyTo }));

  expect(await del('ABC123')).toEqual({ licensePlate: 'ABC123', status: 'deleted' });
  expect(await del('ABC123')).toEqual({ licensePlate: 'ABC123', status: 'deleted' });
  expect(await check('ABC123')).toMatchObject({ paid: false, entryTimestamp: 0, priceCents: 0 });
});

test('plates are matched case-sensitively', async () => {
  enter('abc123', T0);
  clock = T0 + 45 * MIN;
  expect((await pay('ABC123')).entryTimestamp).toBe(0);
  expect((await pay('abc123')).priceCents).toBe(200);
});

test('uses the injected fee calculator', async () => {
  const flat: IFeeCalculator = { calculate: () => 999 };
  const custom = new PaymentActor({ calculator: flat, now: () => T0 });
  custom.tell({ type: 'CarEntered', licensePlate: 'X', entryTimestamp: T0 });

  const status = await custom.ask<PaymentStatus>(replyTo => ({ type: 'Pay', licensePlate: 'X', replyTo }));
  expect(status.priceCents).toBe(999);
  custom.stop();
});
