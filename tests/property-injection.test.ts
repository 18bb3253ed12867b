import { describe, it, expect } from 'vitest';
import {
  DIKey,
  InjectProperty,
  Injector,
  Matchers,
  MissingBindingError,
  ModuleDef,
  Provider,
  Scope,
  getPropertyInjections,
  providerOf,
} from '../src';

class Clock {
  now(): number {
    return 42;
  }
}

class Mailer {}

class Job {
  @InjectProperty(Clock) clock?: Clock;
}

class ReportJob extends Job {
  @InjectProperty(providerOf(Mailer)) mailer?: Provider<Mailer>;
}

class Greeter {
  @InjectProperty(DIKey.named(String, 'greeting')) greeting?: string;
}

const module = () =>
  new ModuleDef()
    .make(Clock).in(Scope.Singleton).from().type(Clock)
    .make(Mailer).from().type(Mailer)
    .make(ReportJob).from().type(ReportJob)
    .make(String).named('greeting').from().value('hello');

describe('Property injection', () => {
  it('should fill marked properties after construction', () => {
    const injector = Injector.create([module(), new ModuleDef().make(Job).from().type(Job)]);

    const job = injector.getInstance(Job);

    expect(job.clock).toBe(injector.getInstance(Clock));
  });

  it('should inject inherited properties and providers', () => {
    const injector = Injector.create([module()]);

    const job = injector.getInstance(ReportJob);

    expect(job.clock?.now()).toBe(42);
    expect(job.mailer?.get()).toBeInstanceOf(Mailer);
    expect(job.mailer?.get()).not.toBe(job.mailer?.get());
  });

  it('should record injection points per class', () => {
    expect(getPropertyInjections(Job.prototype).map(injection => injection.property)).toEqual(['clock']);
    expect(getPropertyInjections(ReportJob.prototype).map(injection => injection.property)).toEqual([
      'clock',
      'mailer',
    ]);
  });

  it('should inject qualified keys', () => {
    const injector = Injector.create([module(), new ModuleDef().make(Greeter).from().type(Greeter)]);

    expect(injector.getInstance(Greeter).greeting).toBe('hello');
  });

  it('should inject instances built outside the injector', () => {
    const heard: string[] = [];
    const injector = Injector.create([
      module(),
      new ModuleDef().bindListener(Matchers.subclassesOf(Job), {
        hear(type) {
          heard.push(type.name);
        },
      }),
    ]);
    const job = new ReportJob();

    injector.getMembersInjector(ReportJob)(job);

    expect(job.clock).toBe(injector.getInstance(Clock));
    expect(job.mailer?.get()).toBeInstanceOf(Mailer);
    expect(heard).toEqual(['ReportJob']);
  });

  it('should fail on an unbound property dependency', () => {
    const injector = Injector.create([new ModuleDef().make(Job).from().type(Job)]);

    expect(() => injector.getInstance(Job)).toThrow(MissingBindingError);
  });
});
