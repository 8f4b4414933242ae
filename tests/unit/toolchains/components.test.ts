import { describe, it, expect } from 'vitest';
import { FailedToRemoveError, InvalidOptionError, ToolchainAlreadyInstalledError } from '../../../src/core/errors.js';
import { getCargoBinPath, layoutUnder } from '../../../src/core/paths.js';
import { createCrate, installCrate, parseCrates, uninstallCrate } from '../../../src/toolchains/crates.js';
import { createEspIdf, installEspIdf } from '../../../src/toolchains/esp-idf.js';
import { createGcc, gccFlavorFor, installGcc } from '../../../src/toolchains/gcc.js';
import { removeDirOrFail } from '../../../src/toolchains/helpers.js';
import { componentKey, describeComponent, uninstallComponent } from '../../../src/toolchains/index.js';
import { createLlvm, installLlvm, llvmExports, uninstallLlvm } from '../../../src/toolchains/llvm.js';
import { createRiscvTarget, installRiscvTarget, uninstallRiscvTarget } from '../../../src/toolchains/riscv-target.js';
import { createXtensaRust, installXtensaRust } from '../../../src/toolchains/xtensa-rust.js';
import { exeSuffix } from '../../../src/utils/platform.js';
import { FakeToolbox } from '../support/fake-toolbox.js';

const layout = layoutUnder('/home/dev');
const linux = 'x86_64-unknown-linux-gnu';

describe('Xtensa Rust', () => {
  const rust = createXtensaRust('1.69.0.0', linux, layout);

  it('points at the release artifacts', () => {
    expect(rust.path).toBe('/home/dev/.rustup/toolchains/esp');
    expect(rust.distUrl).toBe(
      'https://github.com/esp-rs/rust-build/releases/download/v1.69.0.0/rust-1.69.0.0-x86_64-unknown-linux-gnu.tar.xz',
    );
    expect(rust.srcDistUrl).toBe('https://github.com/esp-rs/rust-build/releases/download/v1.69.0.0/rust-src-1.69.0.0.tar.xz');
  });

  it('runs both installers from a temporary dist directory', async () => {
    const toolbox = new FakeToolbox();
    const tmp = '/home/dev/.espressif/dist/xtensa-rust-1.69.0.0';

    expect(await installXtensaRust(rust, { toolbox, layout })).toEqual([]);
    expect(toolbox.calls).toEqual([
      `download ${rust.distUrl} -> ${tmp}`,
      'run bash install.sh --destdir=/home/dev/.rustup/toolchains/esp --prefix= --without=rust-docs-json-preview,rust-docs',
      `download ${rust.srcDistUrl} -> ${tmp}`,
      'run bash install.sh --destdir=/home/dev/.rustup/toolchains/esp --prefix= --without=rust-docs-json-preview',
      `removeDir ${tmp}`,
    ]);
  });

  it('extracts the zips straight into place on Windows', async () => {
    const windowsRust = createXtensaRust('1.69.0.0', 'x86_64-pc-windows-msvc', layout);
    const toolbox = new FakeToolbox();

    await installXtensaRust(windowsRust, { toolbox, layout });
    expect(toolbox.calls).toEqual([
      `download https://github.com/esp-rs/rust-build/releases/download/v1.69.0.0/rust-1.69.0.0-x86_64-pc-windows-msvc.zip -> ${windowsRust.path}`,
      `download https://github.com/esp-rs/rust-build/releases/download/v1.69.0.0/rust-src-1.69.0.0.zip -> ${windowsRust.path}`,
    ]);
  });

  it('refuses to overwrite an existing toolchain', async () => {
    const toolbox = new FakeToolbox([rust.path]);
    await expect(installXtensaRust(rust, { toolbox, layout })).rejects.toThrow(ToolchainAlreadyInstalledError);
    expect(toolbox.calls).toEqual([]);
  });
});

describe('LLVM', () => {
  const llvm = createLlvm('15', false, linux, layout);

  it('selects the release for the major version', () => {
    expect(llvm.path).toBe(
      '/home/dev/.espressif/tools/xtensa-esp32-elf-clang/esp-15.0.0-20221201-x86_64-unknown-linux-gnu',
    );
    expect(llvm.url).toBe(
      'https://github.com/espressif/llvm-project/releases/download/esp-15.0.0-20221201/llvm-esp-15.0.0-20221201-linux-amd64.tar.xz',
    );
    expect(createLlvm('16', false, 'aarch64-apple-darwin', layout).url).toBe(
      'https://github.com/espressif/llvm-project/releases/download/esp-16.0.4-20231113/llvm-esp-16.0.4-20231113-macos-arm64.tar.xz',
    );
  });

  it('rejects unknown versions', () => {
    expect(() => createLlvm('17', false, linux, layout)).toThrow(InvalidOptionError);
  });

  it('exports the clang paths', () => {
    expect(llvmExports(llvm)).toEqual([
      `export LIBCLANG_PATH="${llvm.path}/esp-clang/lib"`,
      `export CLANG_PATH="${llvm.path}/esp-clang/bin/clang"`,
    ]);
    expect(llvmExports(createLlvm('15', true, linux, layout))).toEqual([
      `export LIBCLANG_PATH="${llvm.path}/esp-clang/lib"`,
    ]);
  });

  it('exports libclang and PATH on Windows', () => {
    const windows = createLlvm('15', false, 'x86_64-pc-windows-msvc', layout);
    expect(llvmExports(windows)).toEqual([
      `$Env:LIBCLANG_PATH="${windows.path}/esp-clang/bin/libclang.dll"`,
      `$Env:PATH = "${windows.path}/esp-clang/bin;" + $Env:PATH`,
    ]);
  });

  it('reuses an existing installation', async () => {
    const toolbox = new FakeToolbox([llvm.path]);
    expect(await installLlvm(llvm, { toolbox, layout })).toEqual(llvmExports(llvm));
    expect(toolbox.calls).toEqual([]);
  });

  it('removes the whole clang tool directory', async () => {
    const toolbox = new FakeToolbox([llvm.path]);
    await uninstallLlvm(llvm.path, { toolbox, layout });
    expect(toolbox.calls).toEqual(['removeDir /home/dev/.espressif/tools/xtensa-esp32-elf-clang']);
    expect(toolbox.paths.size).toBe(0);
  });
});

describe('GCC', () => {
  it('maps targets onto toolchain flavours', () => {
    expect(gccFlavorFor('esp32s2')).toBe('xtensa-esp32s2');
    expect(gccFlavorFor('esp32c2')).toBe('riscv32');
    expect(gccFlavorFor('esp32c3')).toBe('riscv32');
  });

  it('names the crosstool-NG artifact for the host', () => {
    const gcc = createGcc('xtensa-esp32s3', 'aarch64-apple-darwin', layout);
    expect(gcc.path).toBe('/home/dev/.espressif/tools/xtensa-esp32s3-elf/esp-12.2.0_20230208');
    expect(gcc.url).toBe(
      'https://github.com/espressif/crosstool-NG/releases/download/esp-12.2.0_20230208/xtensa-esp32s3-elf-12.2.0_20230208-aarch64-apple-darwin.tar.xz',
    );
    expect(createGcc('riscv32', linux, layout).url).toBe(
      'https://github.com/espressif/crosstool-NG/releases/download/esp-12.2.0_20230208/riscv32-esp-elf-12.2.0_20230208-x86_64-linux-gnu.tar.xz',
    );
    expect(createGcc('riscv32', 'x86_64-pc-windows-msvc', layout).url).toBe(
      'https://github.com/espressif/crosstool-NG/releases/download/esp-12.2.0_20230208/riscv32-esp-elf-12.2.0_20230208-x86_64-w64-mingw32.zip',
    );
  });

  it('downloads and prepends the bin directory to PATH', async () => {
    const gcc = createGcc('xtensa-esp32', linux, layout);
    const toolbox = new FakeToolbox();

    expect(await installGcc(gcc, { toolbox, layout })).toEqual([
      `export PATH="${gcc.path}/xtensa-esp32-elf/bin:$PATH"`,
    ]);
    expect(toolbox.calls).toEqual([`download ${gcc.url} -> ${gcc.path}`]);
  });
});

describe('RISC-V targets', () => {
  const riscv = createRiscvTarget('nightly');

  it('adds rust-src and both targets', async () => {
    const toolbox = new FakeToolbox();
    await installRiscvTarget(riscv, { toolbox, layout });
    expect(toolbox.calls).toEqual([
      'run rustup component add rust-src --toolchain nightly',
      'run rustup target add --toolchain nightly riscv32imc-unknown-none-elf riscv32imac-unknown-none-elf',
    ]);
  });

  it('removes only the targets still installed', async () => {
    const toolbox = new FakeToolbox();
    toolbox.outputs.set('rustup target list --installed --toolchain nightly', 'riscv32imc-unknown-none-elf\n');

    await uninstallRiscvTarget('nightly', { toolbox, layout });
    expect(toolbox.calls).toEqual([
      'run rustup target list --installed --toolchain nightly',
      'run rustup target remove --toolchain nightly riscv32imc-unknown-none-elf',
    ]);
  });

  it('treats a missing toolchain as nothing to remove', async () => {
    const toolbox = new FakeToolbox();
    toolbox.failures.add('rustup target list');

    await expect(uninstallRiscvTarget('nightly', { toolbox, layout })).resolves.toBeUndefined();
    expect(toolbox.calls).toEqual(['run rustup target list --installed --toolchain nightly']);
  });
});

describe('ESP-IDF', () => {
  it('clones the reference and runs the tool installer', async () => {
    const idf = createEspIdf('5.1', ['esp32', 'esp32c3'], linux, layout);
    const toolbox = new FakeToolbox();

    expect(idf.path).toBe('/home/dev/.espressif/frameworks/esp-idf-v5.1');
    expect(await installEspIdf(idf, { toolbox, layout })).toEqual([
      'export IDF_TOOLS_PATH="/home/dev/.espressif"',
      'export IDF_PATH="/home/dev/.espressif/frameworks/esp-idf-v5.1"',
    ]);
    expect(toolbox.calls).toEqual([
      'clone https://github.com/espressif/esp-idf.git tag:v5.1 -> /home/dev/.espressif/frameworks/esp-idf-v5.1',
      'run bash /home/dev/.espressif/frameworks/esp-idf-v5.1/install.sh esp32,esp32c3',
    ]);
  });
});

describe('crates', () => {
  it('parses comma and space separated names', () => {
    expect(parseCrates('espflash, cargo-espflash espflash')).toEqual(new Set(['espflash', 'cargo-espflash']));
    expect(parseCrates('')).toEqual(new Set());
  });

  it('skips a crate whose binary is already installed', async () => {
    const toolbox = new FakeToolbox([getCargoBinPath(layout, `espflash${exeSuffix()}`)]);
    await installCrate(createCrate('espflash'), { toolbox, layout });
    expect(toolbox.calls).toEqual([]);
  });

  it('installs and uninstalls through cargo', async () => {
    const toolbox = new FakeToolbox();
    await installCrate(createCrate('espflash'), { toolbox, layout });
    expect(toolbox.calls).toEqual(['run cargo install espflash']);

    toolbox.paths.add(getCargoBinPath(layout, `espflash${exeSuffix()}`));
    await uninstallCrate('espflash', { toolbox, layout });
    expect(toolbox.calls).toEqual(['run cargo install espflash', 'run cargo uninstall espflash']);
  });

  it('ignores an uninstall of a crate that is not there', async () => {
    const toolbox = new FakeToolbox();
    await uninstallCrate('espflash', { toolbox, layout });
    expect(toolbox.calls).toEqual([]);
  });
});

describe('component identity', () => {
  it('describes each kind', () => {
    expect(describeComponent(createXtensaRust('1.69.0.0', linux, layout))).toBe('Xtensa Rust 1.69.0.0');
    expect(describeComponent(createLlvm('15', true, linux, layout))).toBe('LLVM esp-15.0.0-20221201 (minimal)');
    expect(describeComponent(createGcc('riscv32', linux, layout))).toBe('GCC riscv32-esp-elf');
    expect(describeComponent(createEspIdf('branch:release/v5.1', ['esp32'], linux, layout))).toBe(
      'ESP-IDF branch:release/v5.1',
    );
    expect(componentKey(createCrate('ldproxy'))).toBe('crate:ldproxy');
  });

  it('dispatches uninstall by kind', async () => {
    const gcc = createGcc('xtensa-esp32', linux, layout);
    const toolbox = new FakeToolbox([gcc.path]);

    await uninstallComponent(gcc, { toolbox, layout });
    expect(toolbox.calls).toEqual(['removeDir /home/dev/.espressif/tools/xtensa-esp32-elf']);
  });

  it('reverses a component from its recorded identity alone', async () => {
    const toolbox = new FakeToolbox([`/home/dev/.cargo/bin/espflash${exeSuffix()}`]);

    await uninstallComponent({ kind: 'gcc', flavor: 'riscv32' }, { toolbox, layout });
    await uninstallComponent({ kind: 'crate', name: 'espflash' }, { toolbox, layout });
    expect(toolbox.calls).toEqual(['run cargo uninstall espflash']);
  });
});

describe('removeDirOrFail', () => {
  it('tells the operator how to recover from a failed removal', async () => {
    const toolbox = new FakeToolbox(['/home/dev/.rustup/toolchains/esp']);
    toolbox.failures.add('removeDir /home/dev/.rustup/toolchains/esp');

    await expect(removeDirOrFail(toolbox, '/home/dev/.rustup/toolchains/esp')).rejects.toThrow(FailedToRemoveError);
    await expect(removeDirOrFail(toolbox, '/home/dev/.rustup/toolchains/esp')).rejects.toThrow(
      "run 'espforge uninstall' again",
    );
  });
});
