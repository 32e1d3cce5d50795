import { confirm } from '@inquirer/prompts';

import type { ConfirmationPort } from '../application/ports/confirmation.port';

export class InquirerConfirmation implements ConfirmationPort {
  public async confirm(message: string): Promise<boolean> {
    return confirm({ message, default: false });
  }
}
