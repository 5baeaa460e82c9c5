#!/usr/bin/env node
import 'dotenv/config';

import { parseOptions } from './cli/args';
import {
  CommandContext,
  commandAdd,
  commandDelete,
  commandHelp,
  commandList,
  commandSave,
  commandWhere
} from './cli/commands';
import { printError } from './cli/output';
import LocalFileExpenseRepository from './repository/entities/expense.entity';
import FileStorage from './service/drivers/fileStorage';
import ExpenseService from './service/expense.service';

async function run(): Promise<void> {
  const argv = process.argv.slice(2);
  const command = argv[0];

  if (!command || command === 'help' || command === '--help' || command === '-h') {
    await commandHelp();
    return;
  }

  const args = parseOptions(argv.slice(1));

  FileStorage.connect();
  try {
    const repository = new LocalFileExpenseRepository();
    const service = new ExpenseService(repository);
    const context: CommandContext = {
      service,
      dataFile: () => repository.filePath
    };

    service.load();

    switch (command) {
      case 'add':
        await commandAdd(context, args);
        break;
      case 'list':
        await commandList(context);
        break;
      case 'delete':
        await commandDelete(context, args);
        break;
      case 'save':
        await commandSave(context);
        break;
      case 'where':
        await commandWhere(context);
        break;
      default:
        throw new Error(`Comando inválido: ${command}. Use: expenses help`);
    }
  } finally {
    FileStorage.disconnect();
  }
}

run().catch((error) => {
  printError(error);
  process.exit(1);
});
