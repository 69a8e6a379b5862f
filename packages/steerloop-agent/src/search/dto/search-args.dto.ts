import { Expose } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import {
  SearchContentType,
  SearchEnginePreference,
  SearchTimePeriod,
} from '@steerloop/shared';

export class ResilientSearchArgsDto {
  @Expose()
  @IsString()
  @IsNotEmpty()
  query!: string;

  @Expose()
  @IsOptional()
  @IsIn(['auto', 'google', 'bing', 'duckduckgo', 'yahoo'])
  engine?: SearchEnginePreference;

  @Expose()
  @IsOptional()
  @IsString()
  language?: string;

  @Expose()
  @IsOptional()
  @IsString()
  region?: string;

  @Expose({ name: 'safe_search' })
  @IsOptional()
  @IsBoolean()
  safeSearch?: boolean;

  @Expose({ name: 'time_period' })
  @IsOptional()
  @IsIn(['any', 'day', 'week', 'month', 'year'])
  timePeriod?: SearchTimePeriod;

  @Expose({ name: 'content_type' })
  @IsOptional()
  @IsIn(['web', 'images', 'news', 'videos'])
  contentType?: SearchContentType;

  @Expose()
  @IsOptional()
  @IsString()
  site?: string;

  @Expose({ name: 'result_count' })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  resultCount?: number;

  @Expose()
  @IsOptional()
  @IsBoolean()
  humanlike?: boolean;
}

export class WeatherSearchArgsDto {
  @Expose()
  @IsString()
  @IsNotEmpty()
  location!: string;

  @Expose()
  @IsOptional()
  @IsString()
  language?: string;

  @Expose()
  @IsOptional()
  @IsString()
  region?: string;
}
