import { describe, it, expect } from 'vitest';
import { DIKey, Id, Injector, MissingBindingError, ModuleDef, Reflected, Scope } from '../src';

// Test classes
class Config {
  constructor(public readonly value: string = 'default') {}
}

@Reflected(Config)
class Database {
  constructor(public readonly config: Config) {}
}

@Reflected(Database, Config)
class UserService {
  constructor(public readonly db: Database, public readonly config: Config) {}
}

@Reflected(String, Number)
class Endpoint {
  constructor(
    @Id('host') public readonly host: string,
    @Id('port') public readonly port: number,
  ) {}
}

abstract class Storage {
  abstract read(name: string): string;
}

class DiskStorage extends Storage {
  read(name: string): string {
    return `disk:${name}`;
  }
}

interface Greeter {
  greet(name: string): string;
}

const Greeter = Symbol('Greeter');

class EnglishGreeter implements Greeter {
  greet(name: string): string {
    return `Hello, ${name}!`;
  }
}

describe('Basic Dependency Injection', () => {
  it('should inject constructor dependencies', () => {
    const module = new ModuleDef()
      .make(Config).from().value(new Config('test'))
      .make(Database).from().type(Database)
      .make(UserService).from().type(UserService);

    const injector = Injector.create([module]);
    const service = injector.getInstance(UserService);

    expect(service).toBeInstanceOf(UserService);
    expect(service.db).toBeInstanceOf(Database);
    expect(service.config.value).toBe('test');
    expect(service.db.config).toBe(service.config);
  });

  it('should create a new instance per resolution for unscoped bindings', () => {
    const module = new ModuleDef()
      .make(Config).from().value(new Config())
      .make(Database).from().type(Database);

    const injector = Injector.create([module]);

    expect(injector.getInstance(Database)).not.toBe(injector.getInstance(Database));
  });

  it('should share singleton instances', () => {
    const module = new ModuleDef()
      .make(Config).from().value(new Config('shared'))
      .make(Database).in(Scope.Singleton).from().type(Database)
      .make(UserService).from().type(UserService);

    const injector = Injector.create([module]);
    const db = injector.getInstance(Database);

    expect(injector.getInstance(Database)).toBe(db);
    expect(injector.getInstance(UserService).db).toBe(db);
  });

  it('should resolve by class and by DIKey alike', () => {
    const module = new ModuleDef()
      .make(Config).in(Scope.Singleton).from().type(Config);

    const injector = Injector.create([module]);

    expect(injector.getInstance(DIKey.of(Config))).toBe(injector.getInstance(Config));
  });

  it('should fail with MissingBindingError naming the dependent', () => {
    const module = new ModuleDef()
      .make(Config).from().value(new Config())
      .make(UserService).from().type(UserService);

    const injector = Injector.create([module]);

    expect(() => injector.getInstance(UserService)).toThrow(MissingBindingError);
    expect(() => injector.getInstance(UserService)).toThrow(
      'Missing binding for Database, required by UserService',
    );
  });

  it('should never return undefined for an unbound key', () => {
    const injector = Injector.create([]);

    expect(() => injector.getInstance(Config)).toThrow('Missing binding for Config');
  });

  it('should inject primitives by qualifier', () => {
    const module = new ModuleDef()
      .make(String).named('host').from().value('localhost')
      .make(Number).named('port').from().value(5432)
      .make(Endpoint).from().type(Endpoint);

    const endpoint = Injector.create([module]).getInstance(Endpoint);

    expect(endpoint.host).toBe('localhost');
    expect(endpoint.port).toBe(5432);
  });

  it('should bind abstract classes through aliases', () => {
    const module = new ModuleDef()
      .make(DiskStorage).in(Scope.Singleton).from().type(DiskStorage)
      .make(Storage).from().alias(DiskStorage);

    const injector = Injector.create([module]);
    const storage = injector.getInstance(Storage);

    expect(storage).toBe(injector.getInstance(DiskStorage));
    expect(storage.read('a.txt')).toBe('disk:a.txt');
  });

  it('should bind interface tokens', () => {
    const module = new ModuleDef()
      .make<Greeter>(Greeter).from().type(EnglishGreeter);

    const greeter = Injector.create([module]).getInstance<Greeter>(Greeter);

    expect(greeter).toBeInstanceOf(EnglishGreeter);
    expect(greeter.greet('World')).toBe('Hello, World!');
  });

  it('should bind factories with typed dependencies', () => {
    const module = new ModuleDef()
      .make(Config).from().factory(() => new Config('made'))
      .make(Database).from().type(Database)
      .make(UserService).from().func(
        [Database, Config],
        (db, config) => new UserService(db, new Config(`${config.value}!`)),
      );

    const service = Injector.create([module]).getInstance(UserService);

    expect(service.db.config.value).toBe('made');
    expect(service.config.value).toBe('made!');
  });

  it('should resolve the injector itself', () => {
    const injector = Injector.create([]);

    expect(injector.getInstance(Injector)).toBe(injector);
    expect(injector.getInstance(Injector.KEY)).toBe(injector);
  });

  it('should expose bindings for introspection', () => {
    const module = new ModuleDef()
      .make(Config).from().value(new Config())
      .make(Database).from().type(Database);

    const injector = Injector.create([module]);

    expect(injector.keys().map(key => key.toString())).toEqual(['Config', 'Database']);
    expect(injector.getBinding(Database)?.kind).toBe('Class');
    expect(injector.getBinding(UserService)).toBeUndefined();
  });
});
