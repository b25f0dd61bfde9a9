import { Injectable, Inject, Logger } from '@nestjs/common';
import { ICustomerRepository } from '../interfaces/customer-repository.interface';
import {
  Interaction,
  InteractionParams,
} from '../../domain/entities/interaction.entity';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

export interface RecordedInteraction {
  taxCode: string;
  position: number;
  interaction: Interaction;
}

@Injectable()
export class RecordInteractionUseCase {
  private readonly logger = new Logger(RecordInteractionUseCase.name);

  constructor(
    @Inject(INJECTION_TOKENS.CUSTOMER_REPOSITORY)
    private readonly repository: ICustomerRepository,
  ) {}

  execute(taxCode: string, params: InteractionParams): RecordedInteraction {
    const interaction = new Interaction(params);
    const position = this.repository.addInteraction(taxCode, interaction);
    this.logger.log(
      `Recorded ${interaction.kindLabel} interaction #${position} for ${taxCode}`,
    );
    return { taxCode, position, interaction };
  }
}
