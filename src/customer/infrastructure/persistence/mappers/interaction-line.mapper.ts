import { Interaction } from '../../../domain/entities/interaction.entity';
import { parseInteractionKind } from '../../../domain/enums/interaction-kind.enum';
import { MalformedRecordException } from '../../../domain/exceptions/malformed-record.exception';
import { joinFields, splitFields } from './line-format';

const INTERACTION_FIELD_COUNT = 7;

export interface OwnedInteraction {
  taxCode: string;
  interaction: Interaction;
}

/**
 * Interaction file line, keyed by the owner's tax code:
 * `taxCode|date|time|kind|description|agent|outcome`
 */
export class InteractionLineMapper {
  static toDomain(line: string): OwnedInteraction {
    const fields = splitFields(line);
    if (fields.length !== INTERACTION_FIELD_COUNT) {
      throw new MalformedRecordException(
        'interaction',
        fields.length,
        INTERACTION_FIELD_COUNT,
      );
    }

    const [taxCode, date, time, kind, description, agent, outcome] = fields;
    return {
      taxCode,
      interaction: new Interaction({
        date,
        time,
        kind: parseInteractionKind(kind),
        description,
        agent,
        outcome,
      }),
    };
  }

  static toLine(taxCode: string, interaction: Interaction): string {
    return joinFields([
      taxCode,
      interaction.date,
      interaction.time,
      interaction.kindLabel,
      interaction.description,
      interaction.agent,
      interaction.outcome,
    ]);
  }
}
