import { describe, it, expect } from 'vitest';
import {
  ApplyReflection,
  ConfigurationError,
  DIKey,
  Dependency,
  Functoid,
  Id,
  Injector,
  ModuleDef,
  providerOf,
} from '../src';

class Config {
  constructor(public readonly value: string = 'default') {}
}

class Database {
  constructor(public readonly config: Config) {}
}

ApplyReflection(Database, Config);

class Replicated {
  constructor(
    @Id('primary') public readonly primary: Database,
    @Id('replica') public readonly replica: Database,
  ) {}
}

ApplyReflection(Replicated, Database, Database);

function keysOf(functoid: Functoid): string[] {
  return functoid.getDependencies().map(dependency => Dependency.toString(dependency));
}

describe('Functoid', () => {
  it('should take dependencies from explicit tokens', () => {
    const functoid = Functoid.fromFunction(
      [Config, DIKey.named(Database, 'primary'), providerOf(Config)],
      (config, db, lazy) => ({ config, db, lazy }),
    );

    expect(keysOf(functoid)).toEqual(['Config', 'Database@Id("primary")', 'Provider<Config>']);
    expect(functoid.getParameters().map(parameter => parameter.index)).toEqual([0, 1, 2]);
  });

  it('should read constructor dependencies with their qualifiers', () => {
    expect(keysOf(Functoid.fromConstructor(Database))).toEqual(['Config']);
    expect(keysOf(Functoid.fromConstructor(Replicated))).toEqual([
      'Database@Id("primary")',
      'Database@Id("replica")',
    ]);
  });

  it('should reject a constructor with parameters but no declared dependencies', () => {
    class Undeclared {
      constructor(public readonly config: Config) {}
    }

    expect(() => Functoid.fromConstructor(Undeclared)).toThrow(ConfigurationError);
    expect(() => Functoid.fromConstructor(Undeclared)).toThrow(
      'Cannot construct Undeclared: its constructor takes 1 parameter(s) but declares no dependencies. ' +
        'Use @Reflected() or ApplyReflection().',
    );
  });

  it('should reject a function with more parameters than declared dependencies', () => {
    function connect(config: Config): Database {
      return new Database(config);
    }

    const functoid = new Functoid(connect);

    expect(() => functoid.getDependencies()).toThrow(ConfigurationError);
    expect(functoid.withDependencies([Config]).getDependencies()).toHaveLength(1);
  });

  it('should detect async functions', () => {
    expect(Functoid.fromFunction([], async () => new Config()).isAsyncFunctoid()).toBe(true);
    expect(Functoid.fromFunction([], () => new Config()).isAsyncFunctoid()).toBe(false);
  });

  it('should map results and keep dependencies', async () => {
    const base = Functoid.fromFunction([Config], config => config.value);
    const mapped = base.map(value => value.toUpperCase());
    const asyncMapped = Functoid.fromFunction([], async () => 'later').map(value => value.length);

    expect(mapped.execute([new Config('abc')])).toBe('ABC');
    expect(keysOf(mapped)).toEqual(['Config']);
    expect(await asyncMapped.execute([])).toBe(5);
  });

  it('should wrap constants', () => {
    const functoid = Functoid.constant(7);

    expect(functoid.execute([])).toBe(7);
    expect(functoid.getDependencies()).toEqual([]);
    expect(functoid.toString()).toBe('Functoid(constant)');
  });

  it('should back factory bindings', () => {
    const injector = Injector.create([
      new ModuleDef()
        .make(Config).from().value(new Config('prod'))
        .make(Database).named('primary').from().factory(Functoid.fromConstructor(Database))
        .make(Database).named('replica').from().func([Config], config => new Database(new Config(`${config.value}-ro`)))
        .make(Replicated).from().type(Replicated),
    ]);

    const replicated = injector.getInstance(Replicated);

    expect(replicated.primary.config.value).toBe('prod');
    expect(replicated.replica.config.value).toBe('prod-ro');
  });
});
