// SPDX-License-Identifier: Apache-2.0

import sinon, {type SinonStubbedInstance} from 'sinon';
import {expect} from 'chai';
import {describe, it, beforeEach, afterEach} from 'mocha';

import {GitExecutionBuilder} from '../../../../../src/integration/git/execution/git-execution-builder.js';
import {WinstonChartPickLogger} from '../../../../../src/core/logging/winston-chart-pick-logger.js';

describe('GitExecutionBuilder', () => {
  let logger: SinonStubbedInstance<WinstonChartPickLogger>;
  let builder: GitExecutionBuilder;

  beforeEach(() => {
    logger = sinon.createStubInstance(WinstonChartPickLogger);
    builder = new GitExecutionBuilder('/usr/local/bin/git', logger);
  });

  afterEach(() => sinon.restore());

  it('should start the command with the configured executable', () => {
    builder.subcommands('show').positional('HEAD:build.json');

    expect(builder.buildCommand()).to.deep.equal(['/usr/local/bin/git', 'show', 'HEAD:build.json']);
  });

  it('should place subcommands before positionals regardless of call order', () => {
    builder.positional('HEAD:build.json').subcommands('show');

    expect(builder.buildCommand()).to.deep.equal(['/usr/local/bin/git', 'show', 'HEAD:build.json']);
  });

  it('should log the command with its working directory', () => {
    builder.subcommands('show').positional('v1:build.json').workingDirectory('/srv/repo');

    builder.buildCommand();

    expect(logger.debug).to.have.been.calledWith('Git command: git show v1:build.json', {
      workingDirectory: '/srv/repo',
    });
  });

  it('should default the working directory to the current one', () => {
    builder.subcommands('status').buildCommand();

    expect(logger.debug).to.have.been.calledWith('Git command: git status', {workingDirectory: process.cwd()});
  });

  it('should reject empty values', () => {
    expect(() => builder.subcommands()).to.throw(Error, 'commands must not be empty');
    expect(() => builder.positional('')).to.throw(Error, 'value must not be null');
    expect(() => builder.environmentVariable('', '0')).to.throw(Error, 'name must not be null');
    expect(() => builder.environmentVariable('GIT_PAGER', '')).to.throw(Error, 'value must not be null');
    expect(() => builder.workingDirectory('')).to.throw(Error, 'workingDirectoryPath must not be null');
  });
});
