import { childEnvironment } from '../../src/collaborators/process';

describe('childEnvironment', () => {
  const serverEnv = {
    PATH: '/usr/local/bin:/usr/bin',
    HOME: '/home/ci',
    CARGO_TERM_COLOR: 'always',
    RUSTUP_TOOLCHAIN: 'stable',
    DOCKER_HOST: 'unix:///var/run/docker.sock',
    SHIPWRIGHT_SECRET_API_TOKEN: 'test-secret',
    SHIPWRIGHT_WEBHOOK_SECRET: 'test-webhook-secret',
    SHIPWRIGHT_VAR_CONFLUENCE_HOST: 'confluence.test',
    AWS_SECRET_ACCESS_KEY: 'test-aws-secret',
    UNSET: undefined,
  };

  it('keeps only the toolchain variables of the server environment', () => {
    expect(childEnvironment(serverEnv)).toEqual({
      PATH: '/usr/local/bin:/usr/bin',
      HOME: '/home/ci',
      CARGO_TERM_COLOR: 'always',
      RUSTUP_TOOLCHAIN: 'stable',
      DOCKER_HOST: 'unix:///var/run/docker.sock',
    });
  });

  it('adds the values granted to the command, overriding inherited ones', () => {
    const env = childEnvironment(serverEnv, { CARGO_HOME: '/work/.cargo', API_TOKEN: 'test-secret' });

    expect(env.CARGO_HOME).toBe('/work/.cargo');
    expect(env.API_TOKEN).toBe('test-secret');
    expect(env.SHIPWRIGHT_SECRET_API_TOKEN).toBeUndefined();
    expect(childEnvironment(serverEnv, { HOME: '/tmp/home' }).HOME).toBe('/tmp/home');
  });
});
