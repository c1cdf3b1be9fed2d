import type { MigrationScript } from '../../types/migration';
import initialSchema from './001_initial_schema';
import deliveryDetails from './002_add_delivery_details';
import runLock from './003_add_run_lock';

/**
 * All migrations, in version order
 */
export const migrations: MigrationScript[] = [initialSchema, deliveryDetails, runLock];
