import { ConsensusCurrent, ConsensusForecast } from './weather';

export type WeatherResult =
    | {
        status: 'success';
        source: 'cache' | 'refresh';
        data: {
            current: ConsensusCurrent;
            forecast: ConsensusForecast | null;
        };
        timestamp: number;
    }
    | {
        status: 'unavailable';
        city: string;
        reason: 'all_sources_failed' | 'not_available' | 'internal_error';
        timestamp: number;
    };
