import { Injectable, Inject, Logger } from '@nestjs/common';
import { ICustomerRepository } from '../interfaces/customer-repository.interface';
import { Interaction } from '../../domain/entities/interaction.entity';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

@Injectable()
export class RemoveInteractionUseCase {
  private readonly logger = new Logger(RemoveInteractionUseCase.name);

  constructor(
    @Inject(INJECTION_TOKENS.CUSTOMER_REPOSITORY)
    private readonly repository: ICustomerRepository,
  ) {}

  execute(taxCode: string, position: number): Interaction {
    const removed = this.repository.removeInteraction(taxCode, position);
    this.logger.log(`Removed interaction #${position} from ${taxCode}`);
    return removed;
  }
}
