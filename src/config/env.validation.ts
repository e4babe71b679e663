import { plainToInstance, Transform } from 'class-transformer';
import { IsBoolean, IsInt, IsNotEmpty, IsOptional, IsString, Max, Min, validateSync } from 'class-validator';

const toBoolean = ({ value }: { value: unknown }) =>
    typeof value === 'string' ? ['true', '1', 'yes'].includes(value.trim().toLowerCase()) : value;

const toInteger = ({ value }: { value: unknown }) =>
    typeof value === 'string' && value.trim() !== '' ? Number(value) : value;

export class EnvironmentVariables {
    @IsString()
    @IsNotEmpty()
    DATABASE_URL!: string;

    @Transform(toBoolean)
    @IsBoolean()
    DATABASE_SSL: boolean = false;

    @Transform(toInteger)
    @IsInt()
    @Min(1)
    @Max(100)
    DATABASE_POOL_MAX: number = 10;

    @IsString()
    @IsNotEmpty()
    JWT_SECRET!: string;

    @Transform(toInteger)
    @IsInt()
    @Min(1)
    @Max(65535)
    PORT: number = 8080;

    @Transform(toBoolean)
    @IsBoolean()
    RUN_MIGRATIONS: boolean = false;

    @IsOptional()
    @IsString()
    MIGRATIONS_DIR?: string;

    @Transform(toInteger)
    @IsInt()
    @Min(1)
    @Max(1000)
    AVAILABILITY_PAGE_SIZE: number = 50;
}

/**
 * Validates process.env for ConfigModule.forRoot and returns typed values.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
    const validated = plainToInstance(EnvironmentVariables, config, { exposeDefaultValues: true });
    const errors = validateSync(validated, { skipMissingProperties: false });

    if (errors.length > 0) {
        const details = errors
            .map(error => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
            .join('; ');
        throw new Error(`Invalid environment configuration: ${details}`);
    }

    return validated;
}
