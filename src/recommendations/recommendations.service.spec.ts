import { ok, err } from '../shared/result';
import { storageUnavailable } from '../shared/storage';
import { RetreatsService } from '../retreats/retreats.service';
import { RecommendationsService } from './recommendations.service';
import { FALLBACK_SPIRIT_MESSAGE } from './spirit-messages';

describe('RecommendationsService', () => {
    let service: RecommendationsService;
    let mockRetreatsService: { list: jest.Mock };

    const retreat = { id: 'r1', title: 'Tide Pools', nature_type: 'ocean', duration_days: 5, price_usd: 0 };

    beforeEach(() => {
        mockRetreatsService = { list: jest.fn().mockResolvedValue(ok([retreat])) };
        service = new RecommendationsService(mockRetreatsService as unknown as RetreatsService);
    });

    describe('recommend', () => {
        it('queries retreats with the built filter and a limit of 8', async () => {
            await service.recommend({ preferred_nature: 'ocean', budget: 0 });

            expect(mockRetreatsService.list).toHaveBeenCalledWith(
                {
                    nature_type: { op: 'eq', value: 'ocean' },
                    price_usd: { op: 'lte', value: 0 },
                },
                8,
            );
        });

        it('returns matches with the guidance message', async () => {
            const result = await service.recommend({ energy: 'calm' });

            expect(result).toEqual({
                ok: true,
                value: {
                    matches: [retreat],
                    spirit_message: 'The waters are still today; gentle breath and soft horizons call you.',
                },
            });
        });

        it('uses the fallback message for an unknown energy', async () => {
            const result = await service.recommend({ energy: 'sleepy' });

            expect(result.ok && result.value.spirit_message).toBe(FALLBACK_SPIRIT_MESSAGE);
        });

        it('passes storage failures through', async () => {
            mockRetreatsService.list.mockResolvedValue(err(storageUnavailable('offline')));

            const result = await service.recommend({ energy: 'calm' });

            expect(result).toEqual({ ok: false, error: { kind: 'storage_unavailable', message: 'offline' } });
        });
    });

    describe('quiz', () => {
        it('gives the same answer as recommend for the same preferences', async () => {
            const preference = { energy: 'adventurous', preferred_nature: 'mountain', duration: 10, goals: 'climb' };

            const fromQuiz = await service.quiz(preference);
            const fromRecommend = await service.recommend(preference);

            expect(fromQuiz).toEqual(fromRecommend);
            expect(mockRetreatsService.list.mock.calls[0]).toEqual(mockRetreatsService.list.mock.calls[1]);
        });
    });
});
