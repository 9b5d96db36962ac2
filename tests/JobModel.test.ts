describe('JobModel', () => {
  const originalEnv = process.env.NODE_ENV;

  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
  });

  test.each(['production', 'development', 'test'])('should build the unique jobId index under NODE_ENV=%s', async (env) => {
    process.env.NODE_ENV = env;

    await jest.isolateModulesAsync(async () => {
      const { JobModel } = await import('../src/models/Job');

      expect(JobModel.schema.get('autoIndex')).toBe(true);
      expect(JobModel.schema.indexes()).toContainEqual([{ jobId: 1 }, expect.objectContaining({ unique: true })]);
    });
  });
});
