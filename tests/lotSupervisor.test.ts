import { LotSupervisor } from "../src/services/lotSupervisor";
import { LotDeregistered, LotRegistered, LotStatus, RegisteredLots, notFoundStatus } from "../src/dtos/lot.dto";

const register = (sup: LotSupervisor, lotId: string, maxCapacity: number, latitude = 0, longitude = 0) =>
  sup.ask<LotRegistered>(replyTo => ({ type: 'Register', lotId, maxCapacity, latitude, longitude, replyTo }));

const status = (sup: LotSupervisor, lotId: string) =>
  sup.ask<LotStatus>(replyTo => ({ type: 'GetStatus', lotId, replyTo }));

const registered = (sup: LotSupervisor) =>
  sup.ask<RegisteredLots>(replyTo => ({ type: 'GetRegistered', replyTo }));

const update = (sup: LotSupervisor, lotId: string, currentOccupancy: number, timestamp = 1) =>
  sup.tell({ type: 'UpdateOccupancy', lotId, currentOccupancy, timestamp });

let sup: LotSupervisor;

beforeEach(() => {
  sup = new LotSupervisor(1000, () => 42);
});

afterEach(() => {
  sup.stop();
});

test('registering the same lot twice keeps the first capacity and one lot', async () => {
  const first = await register(sup, 'L', 50);
  update(sup, 'L', 7);
  const second = await register(sup, 'L', 80);

  expect(first).toEqual({ lotId: 'L', maxCapacity: 50, status: 'registered' });
  expect(second).toEqual({ lotId: 'L', maxCapacity: 50, status: 'registered' });
  expect(await registered(sup)).toEqual({ L: 50 });
  // same lot state survived the second registration
  expect((await status(sup, 'L')).currentOccupancy).toBe(7);
});

test('fire-and-forget registration without a reply channel', async () => {
  sup.tell({ type: 'Register', lotId: 'quiet', maxCapacity: 5, latitude: 0, longitude: 0 });
  expect(await registered(sup)).toEqual({ quiet: 5 });
});

test('occupancy is last write wins', async () => {
  await register(sup, 'L', 50);
  update(sup, 'L', 10, 100);
  update(sup, 'L', 35, 200);
  update(sup, 'L', 5, 300);

  const s = await status(sup, 'L');
  expect(s.currentOccupancy).toBe(5);
  expect(s.availableSpaces).toBe(45);
  expect(s.lastUpdateTimestamp).toBe(300);
});

test('a stale report still overwrites a newer one', async () => {
  await register(sup, 'L', 50);
  update(sup, 'L', 20, 500);
  update(sup, 'L', 3, 100);

  const s = await status(sup, 'L');
  expect(s.currentOccupancy).toBe(3);
  expect(s.lastUpdateTimestamp).toBe(100);
});

test('full detection at, below and above capacity', async () => {
  await register(sup, 'L', 10);

  update(sup, 'L', 10);
  expect((await status(sup, 'L')).isFull).toBe(true);

  update(sup, 'L', 9);
  expect((await status(sup, 'L')).isFull).toBe(false);

  update(sup, 'L', 11);
  const over = await status(sup, 'L');
  expect(over.isFull).toBe(true);
  expect(over.currentOccupancy).toBe(11);
  expect(over.availableSpaces).toBe(-1);
});

test('new lot starts empty with its coordinates', async () => {
  await register(sup, 'L', 20, 48.1, 11.6);
  expect(await status(sup, 'L')).toEqual({
    lotId: 'L',
    currentOccupancy: 0,
    maxCapacity: 20,
    availableSpaces: 20,
    isFull: false,
    latitude: 48.1,
    longitude: 11.6,
    lastUpdateTimestamp: 42,
  });
});

test('unknown lot status is the zero sentinel', async () => {
  const s = await status(sup, 'nonexistent');
  expect(s).toEqual(notFoundStatus('nonexistent'));
  expect(s).toMatchObject({ currentOccupancy: 0, maxCapacity: 0, isFull: false });
});

test('updates for unknown lots are dropped', async () => {
  update(sup, 'ghost', 12);
  expect(await registered(sup)).toEqual({});
  expect(await status(sup, 'ghost')).toEqual(notFoundStatus('ghost'));
});

test('deregistered lot behaves like one never registered', async () => {
  await register(sup, 'L', 50);
  update(sup, 'L', 30);

  const reply = await sup.ask<LotDeregistered>(replyTo => ({ type: 'Deregister', lotId: 'L', replyTo }));
  expect(reply).toEqual({ lotId: 'L', status: 'deregistered' });
  expect(await status(sup, 'L')).toEqual(notFoundStatus('L'));
  expect(await registered(sup)).toEqual({});
});

test('deregistering an unknown lot still confirms', async () => {
  const reply = await sup.ask<LotDeregistered>(replyTo => ({ type: 'Deregister', lotId: 'never', replyTo }));
  expect(reply).toEqual({ lotId: 'never', status: 'deregistered' });
});

test('registering again after deregistration starts a fresh lot', async () => {
  await register(sup, 'L', 50);
  update(sup, 'L', 30);
  sup.tell({ type: 'Deregister', lotId: 'L' });

  expect(await register(sup, 'L', 60)).toEqual({ lotId: 'L', maxCapacity: 60, status: 'registered' });
  const s = await status(sup, 'L');
  expect(s.currentOccupancy).toBe(0);
  expect(s.maxCapacity).toBe(60);
});

test('registry snapshot lists every lot with its capacity', async () => {
  await register(sup, 'a', 10);
  await register(sup, 'b', 20);
  const snapshot = await registered(sup);
  snapshot.c = 30;

  expect(await registered(sup)).toEqual({ a: 10, b: 20 });
});
