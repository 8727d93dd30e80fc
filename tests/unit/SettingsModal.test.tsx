import { render, screen } from "@testing-library/react";
import userEvent from "@testing-library/user-event";
import { describe, expect, it, vi } from "vitest";
import { SettingsModal, type SettingsField } from "../../src/components/SettingsModal";

describe("SettingsModal", () => {
  const fields: SettingsField[] = [
    { key: "flag", label: "Enable feature", type: "boolean" },
    { key: "decimals", label: "Decimal places", type: "number", min: 0, max: 6, step: 1 },
  ];

  it("renders controls and wires events", async () => {
    const user = userEvent.setup();
    const handleChange = vi.fn();
    const handleClose = vi.fn();
    const handleReset = vi.fn();

    render(
      <SettingsModal
        isOpen
        title="Preferences"
        fields={fields}
        values={{ flag: false, decimals: undefined }}
        onChange={handleChange}
        onClose={handleClose}
        onReset={handleReset}
      />,
    );

    expect(screen.getByRole("dialog", { name: /preferences/i })).toBeInTheDocument();

    await user.click(screen.getByLabelText(/enable feature/i));
    expect(handleChange).toHaveBeenCalledWith("flag", true);

    await user.type(screen.getByLabelText(/decimal places/i), "4");
    expect(handleChange).toHaveBeenLastCalledWith("decimals", 4);

    await user.click(screen.getByRole("button", { name: /reset to defaults/i }));
    expect(handleReset).toHaveBeenCalled();

    await user.click(screen.getByRole("button", { name: /done/i }));
    expect(handleClose).toHaveBeenCalledTimes(1);
  });

  it("closes on Escape", async () => {
    const user = userEvent.setup();
    const handleClose = vi.fn();
    render(
      <SettingsModal isOpen title="Preferences" fields={fields} values={{}} onChange={vi.fn()} onClose={handleClose} />,
    );

    await user.keyboard("{Escape}");
    expect(handleClose).toHaveBeenCalledTimes(1);
  });

  it("renders nothing while closed", () => {
    render(<SettingsModal isOpen={false} title="Preferences" fields={fields} values={{}} onChange={vi.fn()} onClose={vi.fn()} />);
    expect(screen.queryByRole("dialog")).not.toBeInTheDocument();
  });
});
