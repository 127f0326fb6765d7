import { Run } from '../runs/run.types';

/**
 * Downstream sink for terminal run outcomes. Called once per terminal
 * transition with the run as stored.
 */
export abstract class TicketNotifier {
  abstract readonly name: string;

  abstract notify(run: Run): Promise<void>;
}
