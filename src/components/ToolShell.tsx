import { ReactNode } from "react";

export type ToolShellProps = {
  intro: ReactNode;
  workspace: ReactNode;
};

export function ToolShell({ intro, workspace }: ToolShellProps) {
  return (
    <div className="tool-shell__layout">
      <aside className="tool-shell__intro">{intro}</aside>
      {workspace}
    </div>
  );
}

export type ToolShellIntroProps = {
  icon: string;
  category?: string;
  title: string;
  titleId?: string;
  summary?: string;
  bullets?: Array<ReactNode>;
  actions?: ReactNode;
};

export function ToolShellIntro({ icon, category, title, titleId, summary, bullets, actions }: ToolShellIntroProps) {
  return (
    <>
      <div className="tool-shell__icon" aria-hidden="true">
        <img src={icon} alt="" />
      </div>
      {category ? <p className="tool-card__category">{category}</p> : null}
      <h1 id={titleId} className="section-heading">
        {title}
      </h1>
      {summary ? <p>{summary}</p> : null}
      {bullets?.length ? (
        <ul>
          {bullets.map((bullet, index) => (
            <li key={index}>{bullet}</li>
          ))}
        </ul>
      ) : null}
      {actions ? <div className="tool-shell__actions">{actions}</div> : null}
    </>
  );
}
