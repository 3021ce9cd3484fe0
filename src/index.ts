import { config as loadEnv } from 'dotenv';
import { loadConfig } from "./infra/config";
import { logger } from "./infra/logger";
import { ParkingSystem } from "./services/parkingSystem";

export { ParkingSystem } from "./services/parkingSystem";
export type { ParkingSystemDeps } from "./services/parkingSystem";
export { loadConfig } from "./infra/config";
export type { AppConfig } from "./infra/config";
export { AskTimeoutError, ParkingError, ValidationError } from "./infra/errors";
export type { IEventPublisher } from "./interfaces/publisher";
export { InMemoryEventPublisher } from "./infra/inMemoryPublisher";
export { LoggingEventPublisher } from "./infra/loggingPublisher";
export type { LotStatus, RegisteredLots } from "./dtos/lot.dto";
export type { PaymentStatus } from "./dtos/session.dto";
export type { BookingConfirmation, BookingEvent } from "./dtos/booking.dto";
export type { NearbyLot } from "./dtos/routing.dto";

async function demo() {
  loadEnv();
  const config = loadConfig();
  const system = new ParkingSystem({ config });

  // edge sources announce their lots
  system.registerLotAsync({ lotId: 'lot-01', maxCapacity: 50, latitude: 52.5200, longitude: 13.4050 });
  system.registerLotAsync({ lotId: 'lot-02', maxCapacity: 100, latitude: 52.5163, longitude: 13.3777 });
  await system.registerLot({ lotId: 'lot-03', maxCapacity: 25, latitude: 52.5251, longitude: 13.3694 });

  system.reportOccupancy({ lotId: 'lot-01', currentOccupancy: 15, edgeServerId: 'edge-1' });
  system.reportOccupancy({ lotId: 'lot-01', currentOccupancy: 18, edgeServerId: 'edge-1' });
  system.reportOccupancy({ lotId: 'lot-02', currentOccupancy: 100, edgeServerId: 'edge-2' });
  system.reportOccupancy({ lotId: 'lot-03', currentOccupancy: 8, edgeServerId: 'edge-3' });

  console.log('Status lot-01:', await system.getLotStatus('lot-01'));
  console.log('Nearby:', await system.findNearby({ latitude: 52.5190, longitude: 13.4000, limit: 2, onlyAvailable: true }));

  system.carEntered({ licensePlate: 'B-AB-123', entryTimestamp: Date.now() - 45 * 60_000 });
  console.log('Paid:', await system.pay('B-AB-123'));
  await system.deleteOnExit('B-AB-123');

  console.log('Booked:', await system.book({ lotId: 'lot-03', licensePlate: 'B-CD-456' }));

  system.shutdown();
}

if (require.main === module) {
  demo().catch(err => {
    logger.error('Demo failed', { error: err instanceof Error ? err.message : String(err) });
    process.exitCode = 1;
  });
}
