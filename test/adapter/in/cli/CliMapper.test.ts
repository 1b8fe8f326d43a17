import {describe, expect, it} from "vitest";
import {
    formatTimestamp,
    toFailureMessage,
    toSuccessMessage
} from "../../../../src/banking/adapter/in/cli/mappers/CliMapper";
import {
    accountChoiceSchema,
    AmountInputSchema,
    NationalIdInputSchema,
    StatementFilterInputSchema
} from "../../../../src/banking/adapter/in/cli/models/CliInput";
import {AccountNotFoundException} from "../../../../src/banking/application/domain/exception/AccountNotFoundException";
import {InvalidCommandException} from "../../../../src/banking/application/domain/exception/InvalidCommandException";
import {InvalidNationalIdException} from "../../../../src/banking/application/domain/exception/InvalidNationalIdException";
import {AccountNumber} from "../../../../src/banking/application/domain/model/AccountNumber";

describe("CliMapper", () => {
    it("失敗メッセージはエラーコードごとの文言になる", () => {
        expect(toFailureMessage(new AccountNotFoundException(new AccountNumber(4))))
            .toBe("\n@@@ Operation failed! Account not found! @@@");
        expect(toFailureMessage(new InvalidNationalIdException("1")))
            .toBe("\n@@@ Operation failed! Invalid CPF! It must contain exactly 11 digits. @@@");
        expect(toFailureMessage(new InvalidCommandException("X", ["a", "b"])))
            .toBe("\n@@@ Operation failed! Invalid data: a, b. @@@");
    });

    it("成功メッセージ", () => {
        expect(toSuccessMessage("Done")).toBe("\n=== Done ===");
    });

    it("日時は dd-mm-yyyy HH:MM:SS（ローカル時刻）", () => {
        expect(formatTimestamp(new Date(2026, 0, 5, 7, 3, 9))).toBe("05-01-2026 07:03:09");
    });
});

describe("CliInput", () => {
    it("CPFは前後の空白を除いて11桁の数字", () => {
        expect(NationalIdInputSchema.parse(" 12345678901 ")).toBe("12345678901");
        expect(NationalIdInputSchema.safeParse("1234567890").success).toBe(false);
    });

    it.each(["10", "10.5", "10,50", "0.01"])("金額 %j は有効", (value) => {
        expect(AmountInputSchema.safeParse(value).success).toBe(true);
    });

    it.each(["", "0", "0.00", "-5", "1.234", "abc", "1e3"])("金額 %j は無効", (value) => {
        expect(AmountInputSchema.safeParse(value).success).toBe(false);
    });

    it.each(["", "deposit", "Withdrawal", " DEPOSIT "])("明細の絞り込み %j は有効", (value) => {
        expect(StatementFilterInputSchema.safeParse(value).success).toBe(true);
    });

    it("口座の選択は 0 から件数-1 まで", () => {
        const schema = accountChoiceSchema(3);

        expect(schema.parse("2")).toBe(2);
        expect(schema.safeParse("3").success).toBe(false);
        expect(schema.safeParse("-1").success).toBe(false);
        expect(schema.safeParse("one").success).toBe(false);
    });
});
