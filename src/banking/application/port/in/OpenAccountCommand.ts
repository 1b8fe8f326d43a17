import {z} from 'zod';
import {NationalId} from '../../domain/model/NationalId';
import {validateCommand} from './validateCommand';

const OpenAccountCommandSchema = z.object({
    nationalId: z.custom<NationalId>((val) => val instanceof NationalId, {
        message: 'nationalId must be a NationalId instance',
    }),
});

/**
 * 口座開設コマンド
 */
export class OpenAccountCommand {
    constructor(public readonly nationalId: NationalId) {
        validateCommand('OpenAccountCommand', OpenAccountCommandSchema, {nationalId});
    }
}
