import { fakeOpenmlHttpClient, readAll } from '../../test/testHelpers';
import OpenmlEndpoints from '../remote/api-endpoints';
import { DatasetCache } from '../remote/dataset-cache';

import { OpenmlSimulation } from './openml-simulation';

describe('OpenmlSimulation', () => {
  const simulation = () =>
    new OpenmlSimulation(61, {
      httpClient: fakeOpenmlHttpClient(),
      cache: new DatasetCache(),
      endpoints: new OpenmlEndpoints({ baseUrl: 'http://openml.test' }),
    });

  it('turns the dataset target into the action set', async () => {
    const interactions = await readAll(simulation());
    expect(interactions.map((interaction) => interaction.context)).toEqual([
      [0.5, 0, 0, 1],
      [1.5, 1, 0, 0],
      [2, 0, 1, 0],
    ]);
    expect(interactions[0].actions).toEqual(['no', 'yes']);
    expect(interactions.map((interaction) => interaction.rewards)).toEqual([
      [0, 1],
      [1, 0],
      [0, 1],
    ]);
  });

  it('names the dataset in its params', () => {
    expect(simulation().params).toEqual({
      openml: 61,
      catAsString: false,
      problemType: 'classification',
      type: 'classification',
    });
    expect(String(simulation())).toBe(
      'OpenmlSimulation(openml=61,catAsString=false,problemType=classification,type=classification)',
    );
  });
});
