import { Customer } from '../../domain/entities/customer.entity';
import { Interaction } from '../../domain/entities/interaction.entity';
import type { InteractionMatch } from '../../application/services/customer-query.service';
import {
  CustomerDetailResponseDto,
  CustomerResponseDto,
} from '../dto/response/customer.response.dto';
import {
  InteractionMatchResponseDto,
  InteractionResponseDto,
} from '../dto/response/interaction.response.dto';

export class CustomerResponseMapper {
  static toSummary(customer: Customer, position: number): CustomerResponseDto {
    return {
      position,
      taxCode: customer.taxCode,
      firstName: customer.firstName,
      lastName: customer.lastName,
      fullName: customer.fullName,
      email: customer.email,
      phone: customer.phone,
      address: customer.address,
      birthDate: customer.birthDate,
      interactionCount: customer.interactions.length,
    };
  }

  static toDetail(
    customer: Customer,
    position: number,
  ): CustomerDetailResponseDto {
    return {
      ...CustomerResponseMapper.toSummary(customer, position),
      interactions: CustomerResponseMapper.toInteractions(customer),
    };
  }

  static toInteractions(customer: Customer): InteractionResponseDto[] {
    return customer.interactions.map((interaction, position) =>
      CustomerResponseMapper.toInteraction(interaction, position),
    );
  }

  static toInteraction(
    interaction: Interaction,
    position: number,
  ): InteractionResponseDto {
    return {
      position,
      date: interaction.date,
      time: interaction.time,
      kind: interaction.kind,
      description: interaction.description,
      agent: interaction.agent,
      outcome: interaction.outcome,
    };
  }

  static toInteractionMatch(match: InteractionMatch): InteractionMatchResponseDto {
    return {
      customerPosition: match.customerPosition,
      taxCode: match.customer.taxCode,
      customerName: match.customer.fullName,
      interaction: CustomerResponseMapper.toInteraction(
        match.interaction,
        match.interactionPosition,
      ),
    };
  }
}
