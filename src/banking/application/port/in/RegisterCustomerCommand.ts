import {z} from 'zod';
import {NationalId} from '../../domain/model/NationalId';
import {validateCommand} from './validateCommand';

/**
 * dd-mm-yyyy 形式で、実在する日付であること
 */
const BirthDateSchema = z
    .string()
    .regex(/^\d{2}-\d{2}-\d{4}$/, 'birthDate must be formatted as dd-mm-yyyy')
    .refine((value) => {
        const [day, month, year] = value.split('-').map(Number);
        const date = new Date(year, month - 1, day);
        return (
            date.getFullYear() === year &&
            date.getMonth() === month - 1 &&
            date.getDate() === day
        );
    }, 'birthDate must be a valid calendar date');

const RegisterCustomerCommandSchema = z.object({
    nationalId: z.custom<NationalId>((val) => val instanceof NationalId, {
        message: 'nationalId must be a NationalId instance',
    }),
    name: z.string().trim().min(1, 'name must not be empty'),
    birthDate: BirthDateSchema,
    address: z.string().trim().min(1, 'address must not be empty'),
});

/**
 * 顧客登録コマンド
 * 不変オブジェクトとして実装
 */
export class RegisterCustomerCommand {
    constructor(
        public readonly nationalId: NationalId,
        public readonly name: string,
        public readonly birthDate: string,
        public readonly address: string
    ) {
        validateCommand('RegisterCustomerCommand', RegisterCustomerCommandSchema, {
            nationalId,
            name,
            birthDate,
            address,
        });
    }
}
