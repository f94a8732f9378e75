import { useApp, useInput, useStdout } from "ink";
import type React from "react";
import { useCallback, useEffect, useState, useSyncExternalStore } from "react";
import type { BrowserController } from "./controller.js";
import { keyName, resolveBrowserCommand } from "./helpers/keybindings.js";
import { browserLayout } from "./helpers/layout.js";
import { BrowserScreen } from "./screens/browser.js";
import { FALLBACK_COLUMNS, FALLBACK_ROWS } from "./theme.js";

type TerminalSize = Readonly<{ rows: number; columns: number }>;

function readSize(stdout: NodeJS.WriteStream): TerminalSize {
  return {
    rows: stdout.rows || FALLBACK_ROWS,
    columns: stdout.columns || FALLBACK_COLUMNS,
  };
}

export type AppProps = Readonly<{
  controller: BrowserController;
  /** Called with an error that ends the program (e.g. inconsistent image data). */
  onFatal: (error: unknown) => void;
}>;

export function App({ controller, onFatal }: AppProps): React.JSX.Element {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [size, setSize] = useState(() => readSize(stdout));

  const subscribe = useCallback(
    (onStoreChange: () => void) => controller.subscribe(onStoreChange),
    [controller],
  );
  const getSnapshot = useCallback(() => controller.getState(), [controller]);
  const state = useSyncExternalStore(subscribe, getSnapshot);

  useEffect(() => {
    const onResize = (): void => {
      setSize(readSize(stdout));
    };
    stdout.on("resize", onResize);
    return () => {
      stdout.off("resize", onResize);
    };
  }, [stdout]);

  useEffect(() => {
    const layout = browserLayout(size.rows, size.columns);
    controller.setPageRows(layout.pageRows);
    controller.setDetailViewport(layout.detailWidth, layout.detailRows);
  }, [controller, size.rows, size.columns]);

  useInput((input, key) => {
    const command = resolveBrowserCommand(keyName(input, key));
    if (!command) return;
    if (command === "quit") {
      exit();
      return;
    }
    void controller.dispatch(command).catch((error: unknown) => {
      onFatal(error);
      exit();
    });
  });

  return <BrowserScreen state={state} rows={size.rows} columns={size.columns} />;
}
