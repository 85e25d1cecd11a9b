import { Config, ConfigProvider, LogLevel } from "effect";

export type Dimension = 1 | 2;

export const SimulationConfig = Config.all({
    dimension: Config.integer("dim").pipe(
        Config.withDefault(1),
        Config.validate({
            message: "dimension must be 1 or 2",
            validation: (n: number): n is Dimension => n === 1 || n === 2,
        })
    ),
    // Empty selects the first preset of the dimension
    preset: Config.string("preset").pipe(Config.withDefault("")),
    bcType: Config.option(Config.string("bc")),
    totalTime: Config.option(Config.number("totalTime")),
    dt: Config.option(Config.number("dt")),
    sampleStride: Config.option(Config.integer("stride")),
    fps: Config.integer("fps").pipe(
        Config.withDefault(20),
        Config.validate({ message: "fps must be between 1 and 120", validation: (n: number) => n >= 1 && n <= 120 })
    ),
    exportPath: Config.option(Config.string("export")),
    animate: Config.boolean("animate").pipe(Config.withDefault(true)),
    logLevel: Config.logLevel("logLevel").pipe(Config.withDefault(LogLevel.Info)),
});

export type SimulationConfig = Config.Config.Success<typeof SimulationConfig>;

const camelCase = (key: string): string => key.replace(/-([a-z])/g, (_, c: string) => c.toUpperCase());

/**
 * Reads `--key=value`, `--key value`, `--flag` and `--no-flag` arguments.
 * Kebab-case keys become camelCase; a bare `1` or `2` selects the dimension.
 */
export const parseArgv = (argv: ReadonlyArray<string>): Map<string, string> => {
    const values = new Map<string, string>();
    for (let k = 0; k < argv.length; k++) {
        const arg = argv[k];
        if (!arg.startsWith("--")) {
            if ((arg === "1" || arg === "2") && !values.has("dim")) {
                values.set("dim", arg);
            }
            continue;
        }
        const body = arg.slice(2);
        const eq = body.indexOf("=");
        if (eq >= 0) {
            values.set(camelCase(body.slice(0, eq)), body.slice(eq + 1));
        } else if (body.startsWith("no-")) {
            values.set(camelCase(body.slice(3)), "false");
        } else if (k + 1 < argv.length && !argv[k + 1].startsWith("--")) {
            values.set(camelCase(body), argv[k + 1]);
            k++;
        } else {
            values.set(camelCase(body), "true");
        }
    }
    return values;
};

/** Command-line flags first, then constant-case environment variables (TOTAL_TIME, LOG_LEVEL, ...). */
export const makeConfigProvider = (argv: ReadonlyArray<string>): ConfigProvider.ConfigProvider =>
    ConfigProvider.fromMap(parseArgv(argv)).pipe(
        ConfigProvider.orElse(() => ConfigProvider.fromEnv().pipe(ConfigProvider.constantCase))
    );
