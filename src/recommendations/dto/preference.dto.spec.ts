import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { PreferenceDto } from './preference.dto';

describe('PreferenceDto', () => {
    const errorsFor = async (plain: Record<string, unknown>) =>
        (await validate(plainToInstance(PreferenceDto, plain))).map((error) => error.property);

    it('accepts an empty body', async () => {
        expect(await errorsFor({})).toEqual([]);
    });

    it('accepts nulls and a zero budget', async () => {
        expect(await errorsFor({ energy: null, budget: 0, duration: null })).toEqual([]);
    });

    it('rejects a fractional duration and a textual budget', async () => {
        expect(await errorsFor({ duration: 2.5, budget: 'cheap' })).toEqual(['budget', 'duration']);
    });
});
